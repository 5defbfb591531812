import { readFileSync } from "node:fs";
import { buildCanvas, parseScene, resolutionFromDpi } from "@inkframe/core";
import { exportCanvas, formatFromPath, isExportFormat } from "@inkframe/render";
import type { ExportFormat } from "@inkframe/render";

interface RenderOptions {
  output?: string;
  format?: string;
  dpi?: string;
}

export function renderCommand(input: string, options: RenderOptions): void {
  try {
    const format = resolveFormat(options);
    const dpi = parseFloat(options.dpi ?? "96");
    if (!(dpi > 0)) {
      throw new Error(`Invalid --dpi "${options.dpi}": must be a positive number`);
    }

    const content = readFileSync(input, "utf-8");
    const canvas = buildCanvas(parseScene(content));

    const outputPath =
      options.output ?? input.replace(/\.(ya?ml|json)$/i, "") + `.${format}`;
    exportCanvas(canvas, outputPath, { format, resolution: resolutionFromDpi(dpi) });
    console.log(`Rendered: ${outputPath}`);
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  }
}

/** Explicit --format, else the output extension, else SVG. */
function resolveFormat(options: RenderOptions): ExportFormat {
  if (options.format !== undefined) {
    if (!isExportFormat(options.format)) {
      throw new Error(`Unknown format "${options.format}". Use one of: svg, pdf, eps, pam`);
    }
    return options.format;
  }
  return (options.output !== undefined ? formatFromPath(options.output) : null) ?? "svg";
}
