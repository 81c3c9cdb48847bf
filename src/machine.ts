import { InputDevice } from "./IO/IO";
import { Memory } from "./memory";
import { RegisterFile } from "./register-file";

/** Everything an instruction may read or write. */
export interface Machine {
  readonly memory: Memory;
  readonly registers: RegisterFile;
}

export function createMachine(keyboard: InputDevice): Machine {
  return { memory: new Memory(keyboard), registers: new RegisterFile() };
}
