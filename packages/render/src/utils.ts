import { num } from "@inkframe/core";

/** Round a number for attribute and operator output ("-0" prints as "0") */
export function n(value: number): string {
  return num(value);
}

/** Space-separated number list, as used by dash arrays */
export function numList(values: readonly number[]): string {
  return values.map(n).join(" ");
}

/** Escape XML special characters in text content and attribute values */
export function escapeXml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

/** Single-quoted CSS string, escaped for use inside an XML `<style>` element */
export function cssString(value: string): string {
  const css = value.replace(/\\/g, "\\\\").replace(/'/g, "\\'").replace(/\n/g, "\\a ");
  return `'${escapeXml(css)}'`;
}
