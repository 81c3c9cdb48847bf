export enum Register {
  R0 = 0,
  R1,
  R2,
  R3,
  R4,
  R5,
  R6,
  R7,
  RPC /* Program Counter */,
  RCOND /* Condition Flags */,
  RCOUNT,
}

// Reading KBSR polls the keyboard: bit 15 set means a key is latched in KBDR.
export enum MMRegister {
  KBSR = 0xfe00 /* keyboard status */,
  KBDR = 0xfe02 /* keyboard data */,
}
