import fs from 'fs/promises';
import path from 'path';
import type { DevelopmentState } from './states';
import type { ExecutionResult } from '../sandbox/types';
import { logger as defaultLogger } from '../utils/logger';
import type { Logger } from '../utils/logger';

export interface OutputMetadata {
  original_request: string;
  iterations: number;
  status: DevelopmentState['status'];
  execution_results: ExecutionResult | null;
  review_feedback: string;
  errors: string[];
}

export interface OutputStoreOptions {
  dir: string;
  filename: string;
  saveMetadata: boolean;
  logger?: Logger;
}

/** Writes the final artifact of a session, and optionally a JSON record of how it was reached */
export class OutputStore {
  private logger: Logger;

  constructor(private options: OutputStoreOptions) {
    this.logger = options.logger ?? defaultLogger;
  }

  get codePath(): string {
    return path.resolve(this.options.dir, this.options.filename);
  }

  get metadataPath(): string {
    const base = path.parse(this.options.filename).name;
    return path.resolve(this.options.dir, `${base}_metadata.json`);
  }

  /** Returns false, without throwing, when there is nothing to save or the write fails */
  async save(state: Readonly<DevelopmentState>): Promise<boolean> {
    if (!state.code) {
      this.logger.warn('No code to save');
      return false;
    }

    try {
      await fs.mkdir(path.resolve(this.options.dir), { recursive: true });
      await fs.writeFile(this.codePath, state.code, 'utf-8');
      this.logger.info(`Final code saved as: ${this.codePath}`);

      if (this.options.saveMetadata) {
        await fs.writeFile(this.metadataPath, JSON.stringify(OutputStore.toMetadata(state), null, 2), 'utf-8');
        this.logger.info(`Metadata saved as: ${this.metadataPath}`);
      }
      return true;
    } catch (error) {
      this.logger.error('Error saving output', { error: error instanceof Error ? error.message : String(error) });
      return false;
    }
  }

  static toMetadata(state: Readonly<DevelopmentState>): OutputMetadata {
    return {
      original_request: state.request,
      iterations: state.iterationCount,
      status: state.status,
      execution_results: state.executionResult ?? null,
      review_feedback: state.reviewFeedback,
      errors: [...state.errors],
    };
  }
}
