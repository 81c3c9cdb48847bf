import { Uint16, WORD_MASK } from "./bits";
import { MMRegister } from "./enums/registers";
import { InputDevice } from "./IO/IO";

export const MEM_SIZE = 1 << 16; // 2^16 (65536)

export function createMemory(size: number) {
  return new Uint16Array(size);
}

/**
 * Flat word-addressed memory. Addresses and values are truncated to 16 bits,
 * so every address is valid and stores wrap modulo 2^16.
 */
export class Memory {
  private readonly cells = createMemory(MEM_SIZE);

  constructor(private readonly keyboard: InputDevice) {}

  public read(address: Uint16): Uint16 {
    address &= WORD_MASK;
    if (address === MMRegister.KBSR) {
      if (this.keyboard.pollReady()) {
        this.cells[MMRegister.KBSR] = 1 << 15;
        this.cells[MMRegister.KBDR] = this.keyboard.readChar();
      } else {
        this.cells[MMRegister.KBSR] = 0x00;
      }
    }
    return this.cells[address];
  }

  /** Reads a cell without triggering device side effects. */
  public peek(address: Uint16): Uint16 {
    return this.cells[address & WORD_MASK];
  }

  public write(address: Uint16, value: Uint16) {
    this.cells[address & WORD_MASK] = value;
  }

  /**
   * Copies `words` in starting at `origin`, stopping at the top of the address
   * space. Returns how many words were written.
   */
  public load(origin: Uint16, words: ArrayLike<number>) {
    origin &= WORD_MASK;
    const count = Math.min(words.length, MEM_SIZE - origin);
    for (let pos = 0; pos < count; pos++) {
      this.cells[origin + pos] = words[pos];
    }
    return count;
  }
}
