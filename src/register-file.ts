import { Uint16 } from "./bits";
import { Flag } from "./enums/flags";
import { Register } from "./enums/registers";
import { createMemory } from "./memory";

export type GeneralRegister =
  | Register.R0
  | Register.R1
  | Register.R2
  | Register.R3
  | Register.R4
  | Register.R5
  | Register.R6
  | Register.R7;

export class RegisterFile {
  public static readonly PC_START = 0x3000; // 0011 0000 0000 0000
  private readonly registers = createMemory(Register.RCOUNT);

  constructor() {
    this.reset();
  }

  public reset() {
    this.registers.fill(0);
    // exactly one flag must hold at all times
    this.registers[Register.RCOND] = Flag.ZRO;
    this.registers[Register.RPC] = RegisterFile.PC_START;
  }

  public get(reg: Register): Uint16 {
    return this.registers[reg];
  }

  public set(reg: Register, value: Uint16) {
    this.registers[reg] = value;
  }

  public get pc(): Uint16 {
    return this.registers[Register.RPC];
  }

  public set pc(value: Uint16) {
    this.registers[Register.RPC] = value;
  }

  public get cond(): Flag {
    return this.registers[Register.RCOND];
  }

  public set cond(flag: Flag) {
    this.registers[Register.RCOND] = flag;
  }

  public updateFlags(reg: Register) {
    if (this.registers[reg] === 0) {
      this.registers[Register.RCOND] = Flag.ZRO;
    } else if (this.registers[reg] >> 15) {
      this.registers[Register.RCOND] = Flag.NEG;
    } else {
      this.registers[Register.RCOND] = Flag.POS;
    }
  }
}
