export enum ExitCode {
  READY = 0,
  TIMED_OUT = 1,
  MISCONFIGURED = 2,
  UNEXPECTED = 3,
}
