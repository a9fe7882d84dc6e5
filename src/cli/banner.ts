import chalk from "chalk";
import stringWidth from "string-width";

const BOX_WIDTH = 60;

const BOX_CHAR = {
  topLeft: "┌",
  topRight: "┐",
  bottomLeft: "└",
  bottomRight: "┘",
  horizontal: "─",
  vertical: "│",
  leftT: "├",
  rightT: "┤",
};

type Paint = (text: string) => string;

const ANSI_PATTERN = /\x1b\[[0-9;]*m/g;

/**
 * Pad a (possibly coloured) line to the inner width of the box.
 * Lines wider than the box are left as they are.
 */
export function alignLine(text: string, width = BOX_WIDTH, border: Paint = chalk.bold.blue): string {
  const textWidth = stringWidth(text.replace(ANSI_PATTERN, ""));
  const padding = Math.max(0, width - 4 - textWidth);
  return `${border(BOX_CHAR.vertical)} ${text}${" ".repeat(padding)} ${border(BOX_CHAR.vertical)}`;
}

/**
 * Render sections as a box; sections are separated by a horizontal rule.
 */
export function renderBox(sections: string[][], border: Paint = chalk.bold.blue, width = BOX_WIDTH): string[] {
  const rule = BOX_CHAR.horizontal.repeat(width - 2);
  const lines = [border(BOX_CHAR.topLeft + rule + BOX_CHAR.topRight)];
  sections.forEach((section, index) => {
    if (index > 0) {
      lines.push(border(BOX_CHAR.leftT + rule + BOX_CHAR.rightT));
    }
    lines.push(...section.map((line) => alignLine(line, width, border)));
  });
  lines.push(border(BOX_CHAR.bottomLeft + rule + BOX_CHAR.bottomRight));
  return lines;
}

export function label(name: string, value: string): string {
  return chalk.yellow("➤ ") + chalk.cyan(name.padEnd(12)) + chalk.green(value);
}
