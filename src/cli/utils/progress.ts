import { DocumentStatus } from '../../types/document.js';

const FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];

/**
 * Terminal spinner. Falls back to plain lines when stdout is not a TTY.
 */
export class ProgressIndicator {
  private frame = 0;
  private interval: NodeJS.Timeout | undefined;
  private interactive = Boolean(process.stdout.isTTY);

  constructor(private message: string) {}

  start(): void {
    if (!this.interactive) {
      console.log(`… ${this.message}`);
      return;
    }
    process.stdout.write('\x1B[?25l');
    this.interval = setInterval(() => {
      process.stdout.write(`\r${FRAMES[this.frame] ?? ''} ${this.message}`);
      this.frame = (this.frame + 1) % FRAMES.length;
    }, 100);
  }

  update(message: string): void {
    this.message = message;
  }

  stop(finalMessage?: string): void {
    this.finish(finalMessage ? `✅ ${finalMessage}` : undefined);
  }

  fail(errorMessage?: string): void {
    this.finish(errorMessage ? `❌ ${errorMessage}` : undefined);
  }

  private finish(line?: string): void {
    if (this.interval !== undefined) {
      clearInterval(this.interval);
      this.interval = undefined;
    }
    if (this.interactive) {
      process.stdout.write('\r\x1B[K\x1B[?25h');
    }
    if (line) {
      console.log(line);
    }
  }
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);

  if (hours > 0) return `${hours}h ${minutes % 60}m ${seconds % 60}s`;
  if (minutes > 0) return `${minutes}m ${seconds % 60}s`;
  return `${seconds}s`;
}

export function formatFileSize(bytes: number): string {
  const units = ['B', 'KB', 'MB', 'GB'];
  let size = bytes;
  let unit = 0;
  while (size >= 1024 && unit < units.length - 1) {
    size /= 1024;
    unit++;
  }
  return `${size.toFixed(1)} ${units[unit] ?? 'B'}`;
}

const STATUS_ICONS: Record<DocumentStatus, string> = {
  UPLOADED: '📥',
  PARSING: '🔎',
  PARSED: '🧩',
  EMBEDDING: '🔢',
  READY: '✅',
  FAILED: '❌',
};

export function formatStatus(status: DocumentStatus): string {
  return `${STATUS_ICONS[status]} ${status}`;
}
