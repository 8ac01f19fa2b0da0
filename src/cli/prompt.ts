import readline from 'readline';
import type { ShellIO } from './shell.js';

/**
 * Console IO for the shell. Lines are queued as readline emits them, so a
 * piped stdin that arrives in one chunk is answered one prompt at a time.
 * `ask` resolves null once the queue is empty and stdin has closed.
 */
export function createConsoleIO(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): ShellIO & { close(): void } {
  const rl = readline.createInterface({ input, output });
  const lines: string[] = [];
  const waiting: Array<(line: string | null) => void> = [];
  let closed = false;

  rl.on('line', (line) => {
    const next = waiting.shift();
    if (next) next(line);
    else lines.push(line);
  });
  rl.once('close', () => {
    closed = true;
    for (const resolve of waiting.splice(0)) resolve(null);
  });

  return {
    ask(question: string): Promise<string | null> {
      if (closed) {
        output.write(question);
      } else {
        rl.setPrompt(question);
        rl.prompt();
      }

      const queued = lines.shift();
      if (queued !== undefined) return Promise.resolve(queued);
      if (closed) return Promise.resolve(null);
      return new Promise((resolve) => {
        waiting.push(resolve);
      });
    },
    print(line = ''): void {
      console.log(line);
    },
    close(): void {
      rl.close();
    },
  };
}
