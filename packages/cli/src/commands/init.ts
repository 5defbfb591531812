import { basicShapesTemplate } from "../templates/basic-shapes.js";
import { strokeStylesTemplate } from "../templates/stroke-styles.js";

export const templates: Record<string, string> = {
  "basic-shapes": basicShapesTemplate,
  "stroke-styles": strokeStylesTemplate,
};

interface InitOptions {
  template: string;
}

export function initCommand(options: InitOptions): void {
  const tmpl = templates[options.template];
  if (!tmpl) {
    console.error(`Unknown template: ${options.template}`);
    console.error(`Available: ${Object.keys(templates).join(", ")}`);
    process.exit(1);
  }

  process.stdout.write(tmpl);
}
