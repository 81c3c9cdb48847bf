import path from "path";
import { CPU } from "./cpu";
import { CPUState } from "./enums/cpu-state";
import { MachineFault } from "./errors";
import { IO } from "./IO/IO";

export enum ExitCode {
  OK = 0,
  LOAD_FAILED = 1,
  USAGE = 2,
  FAULT = 134 /* same status as an aborted process */,
  INTERRUPTED = 254,
}

export type Logger = Pick<Console, "log" | "error">;

export const USAGE = "lc3vm [image-file1] ...";

/**
 * Loads every image in order, then runs the machine until it halts. Later
 * images overwrite earlier ones where they overlap.
 */
export function runImages(
  imagePaths: string[],
  io: IO,
  logger: Logger = console
): ExitCode {
  if (imagePaths.length === 0) {
    logger.log(USAGE);
    return ExitCode.USAGE;
  }

  const vm = new CPU(io);
  for (const imagePath of imagePaths) {
    const result = vm.readImage(path.resolve(process.cwd(), imagePath));
    if (!result.ok) {
      logger.error(result.error.message);
      return ExitCode.LOAD_FAILED;
    }
  }

  let state: CPUState;
  try {
    state = vm.run();
  } catch (err) {
    if (err instanceof MachineFault) {
      logger.error(err.message);
      return ExitCode.FAULT;
    }
    throw err;
  }
  if (state === CPUState.INTERRUPTED) {
    io.print("\n");
    io.flush();
    return ExitCode.INTERRUPTED;
  }
  return ExitCode.OK;
}
