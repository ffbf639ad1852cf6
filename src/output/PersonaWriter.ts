// src/output/PersonaWriter.ts

import { promises as fs } from 'fs';
import path from 'path';
import { OutputError, errorMessage } from '../utils/errors';

export function personaFileName(username: string): string {
  return `${username}_persona.txt`;
}

/**
 * Write the persona text verbatim to `<dir>/<username>_persona.txt`,
 * replacing any existing file
 *
 * @returns Absolute path of the written file
 * @throws {OutputError} If the file cannot be written
 */
export async function writePersona(dir: string, username: string, text: string): Promise<string> {
  const outputPath = path.resolve(dir, personaFileName(username));

  try {
    await fs.writeFile(outputPath, text, 'utf-8');
  } catch (error: unknown) {
    throw new OutputError(`Failed to write persona file ${outputPath}: ${errorMessage(error)}`, {
      outputPath,
    });
  }

  return outputPath;
}
