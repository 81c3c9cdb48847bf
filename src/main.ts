#!/usr/bin/env node
import { ExitCode, runImages } from "./cli";
import { Terminal } from "./IO/terminal";

const args = process.argv.slice(2);

const terminal: Terminal = new Terminal(() => {
  terminal.restore();
  process.stdout.write("\n");
  process.exit(ExitCode.INTERRUPTED);
});
process.on("exit", () => terminal.restore());

terminal.enableRawMode();
terminal.openKeyboard();
process.exit(runImages(args, terminal));
