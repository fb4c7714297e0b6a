/**
 * Terminal output helpers shared by the CLIs.
 */

const COLORS = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  green: "\x1b[32m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  cyan: "\x1b[36m",
};

const useColors = process.stdout.isTTY && !process.env.NO_COLOR;

export function c(color: keyof typeof COLORS, text: string): string {
  return useColors ? `${COLORS[color]}${text}${COLORS.reset}` : text;
}

export function printHeader(title: string): void {
  console.log("");
  console.log(c("bold", "═".repeat(60)));
  console.log(c("bold", ` ${title}`));
  console.log(c("bold", "═".repeat(60)));
  console.log("");
}

export function printSuccess(component: string, message: string): void {
  console.log(`${c("green", "✓")} ${c("bold", component)}: ${message}`);
}

export function printFailure(component: string, message: string): void {
  console.log(`${c("red", "✗")} ${c("bold", component)}: ${message}`);
}

export function printDetail(text: string, indent = 2): void {
  console.log(`${" ".repeat(indent)}${c("dim", "•")} ${text}`);
}

export function printError(text: string, indent = 4): void {
  console.log(`${" ".repeat(indent)}${c("red", "•")} ${text}`);
}
