// Raw ANSI codes, no chalk dependency. NO_COLOR and non-TTY stdout turn them off.

const useColor = !process.env.NO_COLOR && process.stdout.isTTY === true;

const RESET = '\x1b[0m';
const BOLD = '\x1b[1m';
const DIM = '\x1b[2m';
const RED = '\x1b[31m';
const GREEN = '\x1b[32m';
const YELLOW = '\x1b[33m';
const BLUE = '\x1b[34m';
const CYAN = '\x1b[36m';

function paint(code: string, s: string): string {
  return useColor ? `${code}${s}${RESET}` : s;
}

export function bold(s: string): string { return paint(BOLD, s); }
export function dim(s: string): string { return paint(DIM, s); }
export function red(s: string): string { return paint(RED, s); }
export function green(s: string): string { return paint(GREEN, s); }
export function yellow(s: string): string { return paint(YELLOW, s); }
export function blue(s: string): string { return paint(BLUE, s); }
export function cyan(s: string): string { return paint(CYAN, s); }

export function phaseColor(phase: string): string {
  switch (phase) {
    case 'done': return green(phase);
    case 'failed': return red(phase);
    case 'collecting':
    case 'scoring':
      return blue(phase);
    case 'selecting':
    case 'extracting':
      return cyan(phase);
    case 'applying':
    case 'sync_signaled':
      return yellow(phase);
    default: return phase;
  }
}

/** Colour a rubric total out of 100. */
export function scoreColor(total: number): string {
  const s = String(total);
  if (total >= 80) return green(s);
  if (total >= 60) return cyan(s);
  if (total >= 40) return yellow(s);
  return red(s);
}

/**
 * Format data as a simple table with column headers.
 */
export function table(headers: string[], rows: string[][]): string {
  const widths = headers.map((h, i) =>
    Math.max(h.length, ...rows.map(r => stripAnsi(r[i] ?? '').length))
  );

  const headerLine = headers.map((h, i) => h.padEnd(widths[i])).join('  ');
  const separator = widths.map(w => '─'.repeat(w)).join('──');
  const bodyLines = rows.map(row =>
    row.map((cell, i) => {
      const stripped = stripAnsi(cell);
      const padding = widths[i] - stripped.length;
      return cell + ' '.repeat(Math.max(0, padding));
    }).join('  ')
  );

  return [bold(headerLine), separator, ...bodyLines].join('\n');
}

export function stripAnsi(s: string): string {
  return s.replace(/\x1b\[[0-9;]*m/g, '');
}

// Status lines go to stderr under --json so stdout stays parseable.
let logToStderr = false;

export function routeLogsToStderr(): void {
  logToStderr = true;
}

function log(line: string): void {
  if (logToStderr) console.error(line);
  else console.log(line);
}

/**
 * Print header banner for a command.
 */
export function header(title: string): void {
  log(`\n${bold(`[conclave] ${title}`)}\n`);
}

/**
 * Print a warning.
 */
export function warn(msg: string): void {
  log(`${yellow('[conclave]')} ${msg}`);
}

/**
 * Print an info message.
 */
export function info(msg: string): void {
  log(`${cyan('[conclave]')} ${msg}`);
}

/**
 * Print a success message.
 */
export function success(msg: string): void {
  log(`${green('[conclave]')} ${msg}`);
}

/**
 * Print an error to stderr.
 */
export function error(msg: string): void {
  console.error(`${red('[conclave]')} ${msg}`);
}
