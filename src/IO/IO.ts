export interface InputDevice {
  /** Non-blocking: reports whether `readChar` would return immediately. */
  pollReady(): boolean;
  /** Blocks until one character is available and returns its code. */
  readChar(): number;
  /** Non-blocking: true once the user has asked to stop the machine. */
  interrupted(): boolean;
}

export interface OutputDevice {
  putChar(char: number): void;
  print(string: string): void;
  flush(): void;
}

export interface IO extends InputDevice, OutputDevice {}
