#!/usr/bin/env node
import { Command } from "commander";
import { renderCommand } from "./commands/render.js";
import { initCommand } from "./commands/init.js";
import { validateCommand } from "./commands/validate.js";

const program = new Command();

program
  .name("inkframe")
  .description("Render vector scenes to SVG, PDF, EPS and raster images")
  .version("0.1.0");

program
  .command("render <input>")
  .description("Render a scene from a YAML/JSON file")
  .option("-o, --output <file>", "Output file path (default: <input>.<format>)")
  .option("-f, --format <format>", "Output format (svg, pdf, eps, pam)")
  .option("--dpi <n>", "Raster resolution in dots per inch", "96")
  .action(renderCommand);

program
  .command("validate <input>")
  .description("Check a scene file for errors and statements that draw nothing")
  .action(validateCommand);

program
  .command("init")
  .description("Print a template scene file")
  .option(
    "-t, --template <name>",
    "Template name (basic-shapes, stroke-styles)",
    "basic-shapes",
  )
  .action(initCommand);

program.parse();
