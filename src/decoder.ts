import { signExtend, Uint16 } from "./bits";
import { OPCode } from "./enums/op-codes";
import { Register } from "./enums/registers";
import { GeneralRegister } from "./register-file";

const GENERAL_REGISTERS = [
  Register.R0,
  Register.R1,
  Register.R2,
  Register.R3,
  Register.R4,
  Register.R5,
  Register.R6,
  Register.R7,
] as const;

export type Operand =
  | { kind: "immediate"; value: Uint16 }
  | { kind: "register"; reg: GeneralRegister };

export type JumpTarget =
  | { kind: "offset"; offset: Uint16 }
  | { kind: "register"; base: GeneralRegister };

export type Instruction =
  | {
      op: OPCode.ADD | OPCode.AND;
      dr: GeneralRegister;
      sr1: GeneralRegister;
      operand: Operand;
    }
  | { op: OPCode.NOT; dr: GeneralRegister; sr: GeneralRegister }
  | { op: OPCode.BR; mask: number; offset: Uint16 }
  | { op: OPCode.JMP; base: GeneralRegister }
  | { op: OPCode.JSR; target: JumpTarget }
  | {
      op: OPCode.LD | OPCode.LDI | OPCode.LEA;
      dr: GeneralRegister;
      offset: Uint16;
    }
  | {
      op: OPCode.LDR;
      dr: GeneralRegister;
      base: GeneralRegister;
      offset: Uint16;
    }
  | { op: OPCode.ST | OPCode.STI; sr: GeneralRegister; offset: Uint16 }
  | {
      op: OPCode.STR;
      sr: GeneralRegister;
      base: GeneralRegister;
      offset: Uint16;
    }
  | { op: OPCode.TRAP; vector: number }
  | { op: OPCode.RES | OPCode.RTI };

function reg(instruction: Uint16, shift: number): GeneralRegister {
  return GENERAL_REGISTERS[(instruction >> shift) & 0x7];
}

// Instruction Encoding
// 15 14 13 12 11 10 09 08 07 06 05 04 03 02 01 00
// [ op code ] [  DR  ] [ SR1  ] 0  0  0  [ SR2  ]
// [ op code ] [  DR  ] [ SR1  ] 1  [    imm5    ]
function operand(instruction: Uint16): Operand {
  if ((instruction >> 5) & 0x1) {
    return { kind: "immediate", value: signExtend(instruction & 0x1f, 5) };
  }
  return { kind: "register", reg: reg(instruction, 0) };
}

const pcOffset9 = (instruction: Uint16) => signExtend(instruction & 0x1ff, 9);
const offset6 = (instruction: Uint16) => signExtend(instruction & 0x3f, 6);

function arithmetic(
  op: OPCode.ADD | OPCode.AND,
  instruction: Uint16
): Instruction {
  return {
    op,
    dr: reg(instruction, 9),
    sr1: reg(instruction, 6),
    operand: operand(instruction),
  };
}

function pcRelativeLoad(
  op: OPCode.LD | OPCode.LDI | OPCode.LEA,
  instruction: Uint16
): Instruction {
  return { op, dr: reg(instruction, 9), offset: pcOffset9(instruction) };
}

function pcRelativeStore(
  op: OPCode.ST | OPCode.STI,
  instruction: Uint16
): Instruction {
  return { op, sr: reg(instruction, 9), offset: pcOffset9(instruction) };
}

export function decode(instruction: Uint16): Instruction {
  const op = (instruction >> 12) & 0xf;

  switch (op) {
    case OPCode.BR:
      return {
        op: OPCode.BR,
        mask: (instruction >> 9) & 0x7,
        offset: pcOffset9(instruction),
      };
    case OPCode.ADD:
      return arithmetic(OPCode.ADD, instruction);
    case OPCode.LD:
      return pcRelativeLoad(OPCode.LD, instruction);
    case OPCode.ST:
      return pcRelativeStore(OPCode.ST, instruction);
    case OPCode.JSR:
      return {
        op: OPCode.JSR,
        target:
          (instruction >> 11) & 1
            ? { kind: "offset", offset: signExtend(instruction & 0x7ff, 11) }
            : { kind: "register", base: reg(instruction, 6) },
      };
    case OPCode.AND:
      return arithmetic(OPCode.AND, instruction);
    case OPCode.LDR:
      return {
        op: OPCode.LDR,
        dr: reg(instruction, 9),
        base: reg(instruction, 6),
        offset: offset6(instruction),
      };
    case OPCode.STR:
      return {
        op: OPCode.STR,
        sr: reg(instruction, 9),
        base: reg(instruction, 6),
        offset: offset6(instruction),
      };
    case OPCode.RTI:
      return { op: OPCode.RTI };
    case OPCode.NOT:
      return {
        op: OPCode.NOT,
        dr: reg(instruction, 9),
        sr: reg(instruction, 6),
      };
    case OPCode.LDI:
      return pcRelativeLoad(OPCode.LDI, instruction);
    case OPCode.STI:
      return pcRelativeStore(OPCode.STI, instruction);
    case OPCode.JMP:
      return { op: OPCode.JMP, base: reg(instruction, 6) };
    case OPCode.RES:
      return { op: OPCode.RES };
    case OPCode.LEA:
      return pcRelativeLoad(OPCode.LEA, instruction);
    case OPCode.TRAP:
      return { op: OPCode.TRAP, vector: instruction & 0xff };
  }
  // a 4-bit field always matches one of the sixteen cases above
  throw new RangeError(`Op code out of range: ${op}`);
}
