export enum SessionStatus {
  IN_PROGRESS = "in_progress",
  FINISHED = "finished",
}
