import { readFileSync } from "node:fs";
import { parseScene, validateScene } from "@inkframe/core";

export function validateCommand(input: string): void {
  try {
    const content = readFileSync(input, "utf-8");
    const scene = parseScene(content);
    const { errors, warnings } = validateScene(scene);

    if (errors.length === 0 && warnings.length === 0) {
      console.log("✓ Scene is valid. No issues found.");
      return;
    }

    if (errors.length > 0) {
      console.error(`\n${errors.length} error(s):`);
      for (const err of errors) {
        console.error(`  ✗ [${err.code}]${where(err.statement)} ${err.message}`);
        if (err.suggestion) {
          console.error(`    → ${err.suggestion}`);
        }
      }
    }

    if (warnings.length > 0) {
      console.warn(`\n${warnings.length} warning(s):`);
      for (const warn of warnings) {
        console.warn(`  ⚠ [${warn.code}]${where(warn.statement)} ${warn.message}`);
        if (warn.suggestion) {
          console.warn(`    → ${warn.suggestion}`);
        }
      }
    }

    console.log(
      `\nSummary: ${errors.length} error(s), ${warnings.length} warning(s)`,
    );

    if (errors.length > 0) {
      process.exit(1);
    }
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  }
}

function where(statement: number | null): string {
  return statement === null ? "" : ` draw[${statement}]`;
}
