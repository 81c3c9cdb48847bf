import { Uint16 } from "./bits";
import { decode, Instruction } from "./decoder";
import { CPUState } from "./enums/cpu-state";
import { OPCode } from "./enums/op-codes";
import { Register } from "./enums/registers";
import { ReservedOpcodeError } from "./errors";
import { loadImage, LoadResult, readImage } from "./image-loader";
import { IO } from "./IO/IO";
import { createMachine, Machine } from "./machine";
import { executeTrap } from "./traps";

export class CPU {
  /** Cycles between two checks for a host interrupt. */
  public static readonly INTERRUPT_CHECK_INTERVAL = 1024;
  private state = CPUState.RUNNING;

  constructor(
    private readonly io: IO,
    public readonly machine: Machine = createMachine(io)
  ) {}

  public get status() {
    return this.state;
  }

  public loadImage(image: Buffer): LoadResult {
    return loadImage(this.machine.memory, image);
  }

  public readImage(imagePath: string): LoadResult {
    return readImage(this.machine.memory, imagePath);
  }

  /** Loads words already in host order; the first one is the origin. */
  public loadArray(array: number[]) {
    const [origin = 0, ...words] = array;
    return this.machine.memory.load(origin, words);
  }

  public run(): CPUState {
    let cycles = 0;
    while (this.state === CPUState.RUNNING) {
      if (
        ++cycles % CPU.INTERRUPT_CHECK_INTERVAL === 0 &&
        this.io.interrupted()
      ) {
        this.state = CPUState.INTERRUPTED;
        break;
      }
      this.step();
    }
    return this.state;
  }

  public step() {
    if (this.state !== CPUState.RUNNING) {
      return this.state;
    }
    const { memory, registers } = this.machine;
    const address = registers.pc;
    const instruction = memory.read(address);
    registers.pc = address + 1;

    this.state = this.execute(decode(instruction), address, instruction);
    return this.state;
  }

  private execute(
    instr: Instruction,
    address: Uint16,
    instruction: Uint16
  ): CPUState {
    const { memory, registers } = this.machine;

    switch (instr.op) {
      case OPCode.ADD:
      case OPCode.AND: {
        const a = registers.get(instr.sr1);
        const b =
          instr.operand.kind === "immediate"
            ? instr.operand.value
            : registers.get(instr.operand.reg);
        registers.set(
          instr.dr,
          instr.op === OPCode.ADD ? (a + b) & 0xffff : a & b
        );
        registers.updateFlags(instr.dr);
        break;
      }
      case OPCode.NOT: {
        registers.set(instr.dr, ~registers.get(instr.sr) & 0xffff);
        registers.updateFlags(instr.dr);
        break;
      }
      case OPCode.BR: {
        if (instr.mask & registers.cond) {
          registers.pc = (registers.pc + instr.offset) & 0xffff;
        }
        break;
      }
      case OPCode.JMP: {
        // also RET when the base register is R7
        registers.pc = registers.get(instr.base);
        break;
      }
      case OPCode.JSR: {
        registers.set(Register.R7, registers.pc);
        if (instr.target.kind === "offset") {
          registers.pc = (registers.pc + instr.target.offset) & 0xffff;
        } else {
          registers.pc = registers.get(instr.target.base);
        }
        break;
      }
      case OPCode.LD: {
        registers.set(instr.dr, memory.read(registers.pc + instr.offset));
        registers.updateFlags(instr.dr);
        break;
      }
      case OPCode.LDI: {
        registers.set(
          instr.dr,
          memory.read(memory.read(registers.pc + instr.offset))
        );
        registers.updateFlags(instr.dr);
        break;
      }
      case OPCode.LDR: {
        registers.set(
          instr.dr,
          memory.read(registers.get(instr.base) + instr.offset)
        );
        registers.updateFlags(instr.dr);
        break;
      }
      case OPCode.LEA: {
        registers.set(instr.dr, (registers.pc + instr.offset) & 0xffff);
        registers.updateFlags(instr.dr);
        break;
      }
      case OPCode.ST: {
        memory.write(registers.pc + instr.offset, registers.get(instr.sr));
        break;
      }
      case OPCode.STI: {
        memory.write(
          memory.read(registers.pc + instr.offset),
          registers.get(instr.sr)
        );
        break;
      }
      case OPCode.STR: {
        memory.write(
          registers.get(instr.base) + instr.offset,
          registers.get(instr.sr)
        );
        break;
      }
      case OPCode.TRAP: {
        registers.set(Register.R7, registers.pc);
        return executeTrap(
          this.machine,
          this.io,
          instr.vector,
          address,
          instruction
        );
      }
      case OPCode.RES:
      case OPCode.RTI:
        throw new ReservedOpcodeError(OPCode[instr.op], address, instruction);
      default: {
        const unhandled: never = instr;
        throw new Error(`Unhandled instruction: ${JSON.stringify(unhandled)}`);
      }
    }
    return CPUState.RUNNING;
  }
}
