export enum TRAPCode {
  GETC = 0x20 /* read a char from the keyboard, not echoed */,
  OUT = 0x21 /* output a char */,
  PUTS = 0x22 /* output a word string */,
  IN = 0x23 /* read a char from the keyboard, echoed */,
  PUTSP = 0x24 /* output a byte string */,
  HALT = 0x25 /* halt the program */,
}
