export enum ReadinessState {
  POLLING = 'POLLING',
  ALL_READY = 'ALL_READY',
  TIMED_OUT = 'TIMED_OUT',
}
