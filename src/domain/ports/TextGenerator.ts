/**
 * Language-generation backend. Latency is unbounded and any call may fail;
 * callers always supply their own fallback text.
 */
export interface TextGenerator {
  generate(prompt: string): Promise<string>;
}
