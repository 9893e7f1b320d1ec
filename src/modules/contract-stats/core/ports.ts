import type { ProviderError, WriteError } from './errors.js';
import type { ExportRequest } from './types.js';
import type { Result } from 'neverthrow';

export interface ExportProvider {
  /**
   * Fetch the raw export text for one state and fiscal year.
   * A body containing "Invalid Entry" is still a success here; the caller decides.
   */
  fetchExport(request: ExportRequest): Promise<Result<string, ProviderError>>;
}

export interface OutputWriter {
  /**
   * Write a file, replacing any previous contents.
   * Resolves to the path that was written.
   */
  write(fileName: string, contents: string): Promise<Result<string, WriteError>>;
}
