export enum CPUState {
  RUNNING,
  HALTED /* HALT trap */,
  INTERRUPTED /* stopped by the host between cycles */,
}
