// src/cli/prompt.ts
import { createInterface } from 'node:readline/promises';

export const INPUT_PROMPT = 'Enter Wikipedia page title or URL: ';

export async function promptForInput(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): Promise<string> {
  const rl = createInterface({ input, output });
  try {
    const answer = await rl.question(INPUT_PROMPT);
    return answer.trim();
  } finally {
    rl.close();
  }
}
