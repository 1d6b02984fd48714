import { GenerationInput, GenerationResult } from '../entities/Job.js';

export type ProgressCallback = (percentage: number, message: string) => void;

export interface GenerateOptions {
  signal: AbortSignal;
  onProgress?: ProgressCallback;
}

/**
 * Interface for the remote video generation provider
 */
export interface IGenerationProvider {
  /**
   * Run one generation. Rejects with a ProviderError; aborting the signal
   * stops local polling but does not cancel the billed remote request.
   */
  generate(input: GenerationInput, options: GenerateOptions): Promise<GenerationResult>;

  /**
   * Health check for the provider
   */
  healthCheck(): Promise<boolean>;

  getCircuitBreakerState?(): 'closed' | 'open' | 'half-open';
}
