/**
 * Text-mode front end.
 *
 * Stands in for the speech collaborators: each input line is one
 * transcribed utterance and each reply is printed instead of spoken.
 *
 * Ctrl+C during a turn aborts that turn. Ctrl+C at the prompt ends the
 * session.
 */

import readline from 'readline';
import type { EventEmitter } from 'events';
import type { ConversationController } from '../conversation/index.js';
import { createLogger } from '../utils/observability/index.js';

const logger = createLogger({ domain: 'cli' });

export const EXIT_WORDS: readonly string[] = ['exit', 'quit', 'bye', 'goodbye'];

export const GREETING = "Hello! I'm your voice assistant. How can I help you today?";
export const FAREWELL = 'Goodbye! Have a great day!';
export const TURN_FAILED_REPLY = "I'm sorry, I encountered an error processing your request.";

export interface TextModeOptions {
  controller: Pick<ConversationController, 'handleUtterance'>;
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
  /** Source of SIGINT events besides the readline interface itself */
  signals?: EventEmitter;
}

export function isExitCommand(line: string): boolean {
  return EXIT_WORDS.includes(line.trim().toLowerCase());
}

/**
 * Run the prompt loop until an exit word, Ctrl+C at the prompt, or the
 * end of input.
 */
export async function runTextMode(options: TextModeOptions): Promise<void> {
  const { controller, output } = options;
  const rl = readline.createInterface({ input: options.input, output, prompt: 'You: ' });

  let activeTurn: AbortController | null = null;
  let closed = false;
  rl.on('close', () => {
    closed = true;
  });

  const onInterrupt = (): void => {
    if (activeTurn) {
      logger.info('turn_interrupted');
      activeTurn.abort();
      return;
    }
    rl.close();
  };

  rl.on('SIGINT', onInterrupt);
  options.signals?.on('SIGINT', onInterrupt);

  const say = (text: string): void => {
    output.write(`Assistant: ${text}\n`);
  };

  try {
    say(GREETING);
    rl.prompt();

    for await (const line of rl) {
      if (isExitCommand(line)) {
        say(FAREWELL);
        break;
      }

      activeTurn = new AbortController();
      try {
        const result = await controller.handleUtterance(line, { signal: activeTurn.signal });
        if (result.outcome === 'aborted') {
          output.write('(interrupted)\n');
        } else if (result.reply !== null) {
          say(result.reply);
        }
      } catch (error) {
        logger.error('turn_failed', { error });
        say(TURN_FAILED_REPLY);
      } finally {
        activeTurn = null;
      }

      if (!closed) rl.prompt();
    }
  } finally {
    options.signals?.off('SIGINT', onInterrupt);
    rl.close();
  }
}
