import readline from 'node:readline';

/**
 * Ask a yes/no question until the user answers.
 * Resolves false if input ends before an answer is given.
 */
export async function confirm(
  question = 'Confirm (yes/no)? ',
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stderr,
): Promise<boolean> {
  const rl = readline.createInterface({ input, output, terminal: false });

  return new Promise((resolve) => {
    let answered = false;

    rl.on('line', (line) => {
      switch (line.trim()) {
        case 'y':
        case 'yes':
          answered = true;
          rl.close();
          resolve(true);
          break;
        case 'n':
        case 'no':
          answered = true;
          rl.close();
          resolve(false);
          break;
        default:
          // Ask again
          output.write(question);
      }
    });

    rl.on('close', () => {
      if (!answered) {
        resolve(false);
      }
    });

    output.write(question);
  });
}
