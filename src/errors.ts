import { types } from "util";
import { formatUint16AsBin, formatUint16AsHex, Uint16 } from "./bits";

/** Errors from Node APIs may come from another realm, so no `instanceof`. */
export function errorMessage(err: unknown): string {
  return types.isNativeError(err) ? err.message : String(err);
}

export function errorCode(err: unknown): unknown {
  return types.isNativeError(err) && "code" in err ? err.code : undefined;
}

/**
 * A condition the architecture has no recovery path for. `address` is where
 * the faulting instruction was fetched from.
 */
export class MachineFault extends Error {
  constructor(
    message: string,
    public readonly address: Uint16,
    public readonly instruction: Uint16
  ) {
    super(
      `${message} at ${formatUint16AsHex(address)} [${formatUint16AsBin(
        instruction
      )}]`
    );
    this.name = "MachineFault";
  }
}

export class ReservedOpcodeError extends MachineFault {
  constructor(opName: string, address: Uint16, instruction: Uint16) {
    super(`Unused op code ${opName}`, address, instruction);
    this.name = "ReservedOpcodeError";
  }
}

export class UnknownTrapError extends MachineFault {
  constructor(
    public readonly vector: number,
    address: Uint16,
    instruction: Uint16
  ) {
    super(
      `Unknown trap vector ${formatUint16AsHex(vector)}`,
      address,
      instruction
    );
    this.name = "UnknownTrapError";
  }
}

export class ImageLoadError extends Error {
  constructor(public readonly imagePath: string, reason: string) {
    super(`Failed to load image: ${imagePath} (${reason})`);
    this.name = "ImageLoadError";
  }
}
