import type { ReadWarning, ResolutionWarning } from '../types';

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly field: string,
    public readonly value: unknown,
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function readWarning(filePath: string, error: unknown): ReadWarning {
  return { type: 'read', path: filePath, message: errorMessage(error) };
}

export function resolutionWarning(library: string, message: string): ResolutionWarning {
  return { type: 'resolution', library, message };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
