export const PROGRAM_NAME = "linefreq";
export const VERSION = "0.1.0";

export interface HelpInfo {
  name: string;
  summary: string;
  usage: string;
  description?: string[];
  arguments?: string[];
  options?: string[];
  examples?: string[];
}

export function formatHelp(info: HelpInfo): string {
  let output = `${info.name} - ${info.summary}\n\n`;
  output += `Usage: ${info.usage}\n`;
  if (info.description && info.description.length > 0) {
    output += "\nDescription:\n";
    for (const line of info.description) {
      output += line ? `  ${line}\n` : "\n";
    }
  }
  if (info.arguments && info.arguments.length > 0) {
    output += "\nArguments:\n";
    for (const arg of info.arguments) {
      output += `  ${arg}\n`;
    }
  }
  if (info.options && info.options.length > 0) {
    output += "\nOptions:\n";
    for (const opt of info.options) {
      output += `  ${opt}\n`;
    }
  }
  if (info.examples && info.examples.length > 0) {
    output += "\nExamples:\n";
    for (const example of info.examples) {
      output += `  ${example}\n`;
    }
  }
  return output;
}

export const linefreqHelp: HelpInfo = {
  name: PROGRAM_NAME,
  summary: "count distinct lines and print them ranked",
  usage: `${PROGRAM_NAME} [OPTION]... [INPUT]`,
  description: [
    "Reads INPUT (or standard input), counts how often each distinct line",
    "occurs, and prints one '<line><TAB><count>' row per distinct line.",
  ],
  arguments: ["INPUT                 file to read (default: standard input)"],
  options: [
    "-s, --sortby=ORDER    Key, Count or None, case-insensitive (default: Count)",
    "    --top=N           print only the first N rows",
    "    --verbose         log progress to standard error",
    "-h, --help            display this help and exit",
    "-V, --version         output version information and exit",
  ],
  examples: [
    `${PROGRAM_NAME} access.log`,
    `cut -d' ' -f1 access.log | ${PROGRAM_NAME} --top 10`,
    `${PROGRAM_NAME} --sortby key words.txt`,
  ],
};
