import fs from 'fs/promises';
import { ValidationError, sessionDataSchema, type SessionData } from '@burrow/core';

/**
 * Read and validate a recorded session from a JSON file
 */
export async function loadSession(filePath: string): Promise<SessionData> {
  const raw = await fs.readFile(filePath, 'utf-8');

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new ValidationError(`Session file ${filePath} is not valid JSON`, {
      filePath,
      cause: error instanceof Error ? error.message : String(error)
    });
  }

  const parsed = sessionDataSchema.safeParse(data);
  if (!parsed.success) {
    throw ValidationError.fromZod(`session file ${filePath}`, parsed.error);
  }

  return parsed.data;
}
