#!/usr/bin/env node
import { Command } from "commander";
import { registerWafCli } from "./cli.js";
import { errorMessage } from "./files.js";

const program = new Command();
program
  .name("wafctl")
  .description("Whitelist, blacklist and tune a Sucuri WAF from the command line");
registerWafCli(program, { logger: console });
program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(errorMessage(err));
  process.exitCode = 1;
});
