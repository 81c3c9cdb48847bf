import { closeSync, constants, openSync, readSync, writeSync } from "fs";
import { keyIn } from "readline-sync";
import { errorCode, errorMessage } from "../errors";
import { IO } from "./IO";

const CTRL_C = 0x03;
const CARRIAGE_RETURN = 0x0d;
const LINE_FEED = 0x0a;

export interface TerminalOptions {
  /** Device polled for keystrokes. */
  ttyPath?: string;
  outputFd?: number;
}

/**
 * Console device. Blocking reads go through readline-sync; polling reads the
 * controlling tty through a non-blocking descriptor so the fetch loop never
 * waits on the keyboard. Output is buffered as raw bytes until `flush`.
 *
 * Raw mode turns Ctrl-C into an ordinary 0x03 byte, so an interrupt is
 * noticed whenever the tty is drained: by `interrupted`, between cycles, or by
 * `pollReady`. Ctrl-C during a blocking read calls `onInterrupt` directly.
 */
export class Terminal implements IO {
  private output: number[] = [];
  private readonly pending: number[] = [];
  private interruptRequested = false;
  private ttyFd: number | undefined;
  private rawMode = false;
  private readonly readBuffer = Buffer.alloc(64);
  private readonly ttyPath: string;
  private readonly outputFd: number;

  constructor(
    private readonly onInterrupt: () => never,
    { ttyPath = "/dev/tty", outputFd = process.stdout.fd }: TerminalOptions = {}
  ) {
    this.ttyPath = ttyPath;
    this.outputFd = outputFd;
  }

  enableRawMode() {
    if (process.stdin.isTTY) {
      process.stdin.setRawMode(true);
      this.rawMode = true;
    }
  }

  /** Without an open keyboard, `pollReady` always reports no input. */
  openKeyboard() {
    try {
      this.ttyFd = openSync(
        this.ttyPath,
        constants.O_RDONLY | constants.O_NONBLOCK
      );
    } catch (err) {
      console.warn(`Keyboard polling unavailable: ${errorMessage(err)}`);
    }
  }

  restore() {
    if (this.rawMode) {
      process.stdin.setRawMode(false);
      this.rawMode = false;
    }
    if (this.ttyFd !== undefined) {
      closeSync(this.ttyFd);
      this.ttyFd = undefined;
    }
  }

  interrupted(): boolean {
    this.drain();
    return this.interruptRequested;
  }

  pollReady(): boolean {
    if (this.pending.length === 0) {
      this.drain();
    }
    return this.pending.length > 0;
  }

  readChar(): number {
    const char = this.pending.shift();
    if (char !== undefined) {
      return char;
    }
    const key = keyIn("", { hideEchoBack: true, mask: "" });
    const code = key.length > 0 ? key.charCodeAt(0) : LINE_FEED;
    if (code === CTRL_C) {
      this.flush();
      this.onInterrupt();
    }
    return toCharCode(code);
  }

  print(string: string): void {
    for (const byte of Buffer.from(string, "latin1")) {
      this.output.push(byte);
    }
  }

  putChar(char: number): void {
    this.output.push(char & 0xff);
  }

  flush(): void {
    if (this.output.length > 0) {
      writeSync(this.outputFd, Buffer.from(this.output));
      this.output = [];
    }
  }

  /** Moves every byte the tty has ready into `pending`. */
  private drain() {
    if (this.ttyFd === undefined) {
      return;
    }
    for (;;) {
      let count: number;
      try {
        count = readSync(
          this.ttyFd,
          this.readBuffer,
          0,
          this.readBuffer.length,
          null
        );
      } catch (err) {
        const code = errorCode(err);
        if (code === "EAGAIN" || code === "EWOULDBLOCK") {
          return;
        }
        throw err;
      }
      if (count === 0) {
        return;
      }
      for (const byte of this.readBuffer.subarray(0, count)) {
        if (byte === CTRL_C) {
          this.interruptRequested = true;
        } else {
          this.pending.push(toCharCode(byte));
        }
      }
    }
  }
}

// raw mode delivers Enter as CR
function toCharCode(char: number) {
  return char === CARRIAGE_RETURN ? LINE_FEED : char;
}
