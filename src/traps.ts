import { Uint16 } from "./bits";
import { CPUState } from "./enums/cpu-state";
import { Register } from "./enums/registers";
import { TRAPCode } from "./enums/trap-codes";
import { UnknownTrapError } from "./errors";
import { IO } from "./IO/IO";
import { Machine } from "./machine";

/**
 * Runs the service routine for a TRAP vector. Every routine that writes
 * output flushes before returning.
 */
export function executeTrap(
  { memory, registers }: Machine,
  io: IO,
  vector: number,
  address: Uint16,
  instruction: Uint16
): CPUState {
  switch (vector) {
    case TRAPCode.GETC: {
      registers.set(Register.R0, io.readChar());
      registers.updateFlags(Register.R0);
      break;
    }
    case TRAPCode.OUT: {
      io.putChar(registers.get(Register.R0) & 0xff);
      io.flush();
      break;
    }
    case TRAPCode.PUTS: {
      // one char per word
      let address = registers.get(Register.R0);
      let char = memory.peek(address);
      while (char) {
        io.putChar(char & 0xff);
        address++;
        char = memory.peek(address);
      }
      io.flush();
      break;
    }
    case TRAPCode.IN: {
      io.print("Enter a character: ");
      io.flush();
      const char = io.readChar();
      io.putChar(char);
      io.flush();
      registers.set(Register.R0, char);
      registers.updateFlags(Register.R0);
      break;
    }
    case TRAPCode.PUTSP: {
      // two chars per word, low byte first
      let address = registers.get(Register.R0);
      let char = memory.peek(address);
      while (char) {
        io.putChar(char & 0xff);
        const char2 = char >> 8;
        if (char2) {
          io.putChar(char2);
        }
        address++;
        char = memory.peek(address);
      }
      io.flush();
      break;
    }
    case TRAPCode.HALT: {
      io.print("HALT\n");
      io.flush();
      return CPUState.HALTED;
    }
    default:
      throw new UnknownTrapError(vector, address, instruction);
  }
  return CPUState.RUNNING;
}
