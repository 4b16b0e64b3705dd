// Compilation phases. A compilation moves from DISCOVERY to FINAL exactly once.
export enum Phase {
  DISCOVERY = 'discovery',
  FINAL = 'final',
}
