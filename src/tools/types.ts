/** Documented signature of a tool, used in oracle prompts */
export interface ToolDescriptor {
  name: string;
  description: string;
  /** Parameter name → short description (type, allowed values) */
  parameters: Record<string, string>;
}

/**
 * Performs named operations with arguments. Calls must be safe to repeat
 * with identical arguments; failures are raised as ToolServiceError.
 */
export interface ToolService {
  invoke(name: string, args: Record<string, unknown>): Promise<string>;
  listTools(): Promise<ToolDescriptor[]>;
  close?(): Promise<void>;
}

export interface HttpToolServiceOptions {
  baseUrl: string;
  token?: string;
  timeout?: number;
  logRequests?: boolean;
}

export type InvokeResponse = { result?: unknown; error?: string };

export type ListToolsResponse = { tools?: Array<Partial<ToolDescriptor>> };
