import { createInterface } from 'readline';

export async function promptUser(question: string): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  return new Promise((resolve) => {
    rl.question(question, (answer) => {
      rl.close();
      resolve(answer.trim());
    });
  });
}

/**
 * Read a secret without echoing it; falls back to a plain prompt when stdin is not a TTY
 */
export async function promptSecure(question: string): Promise<string> {
  if (!process.stdin.isTTY) {
    return promptUser(question);
  }

  process.stdout.write(question);
  process.stdin.setRawMode(true);
  process.stdin.resume();

  return new Promise((resolve, reject) => {
    let input = '';
    const done = (): void => {
      process.stdin.setRawMode(false);
      process.stdin.pause();
      process.stdin.removeListener('data', onData);
    };

    const onData = (data: Buffer): void => {
      for (const char of data.toString()) {
        if (char === '\n' || char === '\r') {
          done();
          process.stdout.write('\n');
          resolve(input);
          return;
        }
        if (char === '\u0003') {
          done();
          reject(new Error('Input cancelled'));
          return;
        }
        if (char === '\u007f') {
          if (input.length > 0) {
            input = input.slice(0, -1);
            process.stdout.write('\b \b');
          }
        } else if (char >= ' ' && char <= '~') {
          input += char;
          process.stdout.write('*');
        }
      }
    };

    process.stdin.on('data', onData);
  });
}

export async function promptConfirm(question: string, defaultValue = false): Promise<boolean> {
  const answer = await promptUser(`${question} (${defaultValue ? 'Y/n' : 'y/N'}): `);
  return answer.length === 0 ? defaultValue : answer.toLowerCase().startsWith('y');
}

/**
 * Prompt with a default shown in parentheses; empty input keeps the default
 */
export async function promptWithDefault(question: string, defaultValue: string): Promise<string> {
  const answer = await promptUser(`${question} (${defaultValue}): `);
  return answer || defaultValue;
}
