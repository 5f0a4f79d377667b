import fs from 'fs/promises';
import path from 'path';
import { PromptOutput } from '../types/smartthings.js';

export const DEFAULT_PROMPT =
  '<|im_start|>system\nYou are a helpful assistant.<|im_end|>\n' +
  '<|im_start|>user\n<image> Please identify the layout of the keyboard on the screen. ' +
  'Return the result as a comma separated string with elements from each row.<|im_end|>\n' +
  '<|im_start|>assistant\n';

export interface PromptRequest {
  method: 'generate_from_image';
  params: [string, string];
  id: number;
}

export function buildPromptRequest(prompt: string, base64Image: string): PromptRequest {
  return {
    method: 'generate_from_image',
    params: [prompt, base64Image],
    id: 42,
  };
}

/**
 * Writes `<image>.prompt.json` and `<image>.b64.txt` next to the captured image.
 */
export async function writePrompt(imagePath: string, prompt: string = DEFAULT_PROMPT): Promise<PromptOutput> {
  const image = await fs.readFile(imagePath);
  const encoded = image.toString('base64');

  const parsed = path.parse(imagePath);
  const stem = path.join(parsed.dir, parsed.name);
  const promptPath = `${stem}.prompt.json`;
  const base64Path = `${stem}.b64.txt`;

  await fs.writeFile(base64Path, encoded);
  await fs.writeFile(promptPath, JSON.stringify(buildPromptRequest(prompt, encoded), null, 2));

  return { promptPath, base64Path };
}
