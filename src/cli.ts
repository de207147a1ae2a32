import { Command } from "commander";
import { registerGenerateCommand } from "./commands/generate.js";
import { registerRunsCommand } from "./commands/runs.js";

export function buildProgram(): Command {
  const program = new Command();

  program
    .name("pagesmith")
    .description("Generate validated product content pages with dependency-ordered agents")
    .version("0.1.0");

  registerGenerateCommand(program);
  registerRunsCommand(program);

  return program;
}
