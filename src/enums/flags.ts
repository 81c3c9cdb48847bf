export enum Flag {
  POS = 1 << 0 /* P */,
  ZRO = 1 << 1 /* Z */,
  NEG = 1 << 2 /* N */,
}
