/**
 * Minimal terminal spinner for the plain output adapter.
 * Without a TTY on stdout it prints the message once instead of animating.
 */

const FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];
const FRAME_INTERVAL_MS = 80;

export class Spinner {
  private intervalId: NodeJS.Timeout | null = null;
  private readonly message: string;
  private currentFrame: number = 0;
  private readonly animated: boolean;
  private readonly stream: NodeJS.WriteStream;

  constructor(message: string = 'Working...', stream: NodeJS.WriteStream = process.stdout) {
    this.message = message;
    this.stream = stream;
    this.animated = stream.isTTY === true;
  }

  start(): void {
    if (this.intervalId) {
      return;
    }

    if (!this.animated) {
      this.stream.write(`${this.message}\n`);
      return;
    }

    this.currentFrame = 0;
    this.stream.write('\x1B[?25l');

    this.intervalId = setInterval(() => {
      const frame = FRAMES[this.currentFrame % FRAMES.length];
      this.stream.write(`\r${frame} ${this.message}`);
      this.currentFrame++;
    }, FRAME_INTERVAL_MS);
  }

  stop(): void {
    if (!this.intervalId) {
      return;
    }

    clearInterval(this.intervalId);
    this.intervalId = null;

    this.stream.write('\r' + ' '.repeat(this.stream.columns || 80) + '\r');
    this.stream.write('\x1B[?25h');
  }
}
