#!/usr/bin/env node
import { Command } from "commander";
import { formatErrorMessage } from "../errors.js";
import { registerInventoryCli } from "./cli.js";

const program = new Command()
  .name("aws-inventory")
  .description("Read-only inventory of AWS compute and storage resources");

registerInventoryCli({ program }, { handleSignals: true, showProgress: process.stderr.isTTY });

try {
  await program.parseAsync(process.argv);
} catch (err) {
  console.error(`[aws-inventory] ${formatErrorMessage(err)}`);
  process.exitCode = 1;
}
