/**
 * The reasoning oracle makes judgment calls (decomposition, tool choice,
 * answer composition) from natural-language instructions. Responses are
 * untrusted free text.
 */
export interface ReasoningOracle {
  decide(instruction: string, context: string): Promise<string>;
  close?(): Promise<void>;
}

export class OracleError extends Error {
  constructor(
    message: string,
    public status?: number,
    public originalError?: unknown,
  ) {
    super(message);
    this.name = 'OracleError';
  }
}
