/**
 * Console logger for the harness.
 *
 * All output goes to stderr so stdout stays clean for command output.
 * Emoji prefixes give instant visual context in the terminal.
 */

// ── Core write ──────────────────────────────────────────────

function write(message: string): void {
  process.stderr.write(message + '\n');
}

// ── Public API ──────────────────────────────────────────────

export function info(message: string): void {
  write(`ℹ️  ${message}`);
}

export function detail(message: string): void {
  write(`   ${message}`);
}

export function step(title: string): void {
  write(`📋 ${title}`);
}

export function stepResult(success: boolean, title: string): void {
  const icon = success ? '✅' : '❌';
  write(`${icon} ${title}`);
}

export function section(title: string): void {
  write(`\n${'─'.repeat(50)}`);
  write(`▶  ${title}`);
  write(`${'─'.repeat(50)}`);
}

export function warn(message: string): void {
  write(`⚠️  ${message}`);
}

export function error(message: string): void {
  write(`💥 ${message}`);
}

export function screenshot(filePath: string): void {
  write(`📸 Screenshot saved: ${filePath}`);
}

export function session(message: string): void {
  write(`🌐 ${message}`);
}
