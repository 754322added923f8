/**
 * Clack Output Adapter
 *
 * OutputPort implementations for the CLI: @clack/prompts on a TTY, plain
 * console lines for piped and CI sessions.
 *
 * @clack/prompts only writes to stdout, so warnings and errors are drawn
 * in its log style here and written to stderr.
 */

import { log, spinner as clackSpinner, note as clackNote } from '@clack/prompts';
import pico from 'picocolors';
import { Spinner } from '../utils/spinner.js';
import type { OutputPort, UnifiedSpinner } from '../core/ports/output.js';

export interface TextSink {
  write(text: string): unknown;
}

const BAR = '│';
const WARN_SYMBOL = '▲';
const ERROR_SYMBOL = '■';

/**
 * A message in clack's log layout: a bar line, the symbol on the first
 * line and the bar in front of every following line.
 */
export function formatClackLogBlock(symbol: string, message: string): string {
  const [first, ...rest] = message.split('\n');
  const lines = [pico.gray(BAR), `${symbol}  ${first}`, ...rest.map(line => `${pico.gray(BAR)}  ${line}`)];
  return `${lines.join('\n')}\n`;
}

/**
 * Create a Clack-based OutputPort for interactive terminal sessions.
 */
export function createClackOutput(errorStream: TextSink = process.stderr): OutputPort {
  return {
    info(message: string): void {
      log.info(message);
    },

    message(message: string): void {
      log.message(message);
    },

    success(message: string): void {
      log.success(message);
    },

    error(message: string): void {
      errorStream.write(formatClackLogBlock(pico.red(ERROR_SYMBOL), message));
    },

    warn(message: string): void {
      errorStream.write(formatClackLogBlock(pico.yellow(WARN_SYMBOL), message));
    },

    note(content: string, title?: string): void {
      clackNote(content, title ?? '');
    },

    spinner(): UnifiedSpinner {
      const s = clackSpinner();
      let isStarted = false;

      return {
        start(message: string) {
          if (!isStarted) {
            s.start(message);
            isStarted = true;
          }
        },
        stop(finalMessage?: string) {
          if (isStarted) {
            s.stop(finalMessage);
            isStarted = false;
          }
        }
      };
    }
  };
}

/**
 * Create a plain console OutputPort for non-interactive sessions (CI, piped output).
 */
export function createPlainOutput(): OutputPort {
  return {
    info(message: string): void {
      console.log(message);
    },

    message(message: string): void {
      console.log(message);
    },

    success(message: string): void {
      console.log(`✓ ${message}`);
    },

    error(message: string): void {
      console.error(`❌ ${message}`);
    },

    warn(message: string): void {
      console.error(`⚠️  ${message}`);
    },

    note(content: string, title?: string): void {
      console.log(title ? `\n${title}\n${content}` : `\n${content}`);
    },

    spinner(): UnifiedSpinner {
      let s: Spinner | null = null;

      return {
        start(message: string) {
          s = new Spinner(message);
          s.start();
        },
        stop(finalMessage?: string) {
          if (s) {
            s.stop();
            if (finalMessage) {
              console.log(finalMessage);
            }
            s = null;
          }
        }
      };
    }
  };
}
