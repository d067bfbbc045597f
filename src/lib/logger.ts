const RESET = "\x1b[0m";
const RED = "\x1b[31m";
const GREEN = "\x1b[32m";
const YELLOW = "\x1b[33m";
const CYAN = "\x1b[36m";
const DIM = "\x1b[2m";
const BOLD = "\x1b[1m";

function stripAnsi(str: string): string {
  return str.replace(/\x1b\[[0-9;]*m/g, "");
}

let capturing = false;
let captured: string[] = [];

function emit(text: string, toStderr = false): void {
  if (capturing) {
    captured.push(stripAnsi(text));
  } else if (toStderr) {
    console.error(text);
  } else {
    console.log(text);
  }
}

export const logger = {
  capture() {
    capturing = true;
    captured = [];
  },

  flush(): string[] {
    const messages = captured;
    captured = [];
    capturing = false;
    return messages;
  },

  isCapturing(): boolean {
    return capturing;
  },

  info(msg: string) {
    emit(`${CYAN}info${RESET} ${msg}`);
  },

  success(msg: string) {
    emit(`${GREEN}✓${RESET} ${msg}`);
  },

  warn(msg: string) {
    emit(`${YELLOW}warn${RESET} ${msg}`);
  },

  error(msg: string) {
    emit(`${RED}error${RESET} ${msg}`, true);
  },

  dim(msg: string) {
    emit(`${DIM}${msg}${RESET}`);
  },

  bold(msg: string) {
    emit(`${BOLD}${msg}${RESET}`);
  },

  // Timestamped activity line, as written to build.log.
  activity(stamp: string, msg: string) {
    const color = msg.startsWith("ERROR") ? RED : msg.startsWith("Skipping") ? DIM : "";
    emit(`${DIM}[${stamp}]${RESET} ${color}${msg}${color ? RESET : ""}`);
  },

  table(headers: string[], rows: string[][]) {
    const colWidths = headers.map((h, i) =>
      Math.max(h.length, ...rows.map((r) => (r[i] ?? "").length)),
    );
    const pad = (cells: string[]) =>
      cells.map((cell, i) => cell.padEnd(colWidths[i] ?? 0)).join("  ").trimEnd();

    emit(`  ${DIM}${pad(headers.map((h) => h.toUpperCase()))}${RESET}`);
    for (const row of rows) {
      emit(`  ${pad(row)}`);
    }
  },

  blank() {
    emit("");
  },
};
