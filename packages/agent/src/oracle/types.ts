export type OracleMessage =
  | { type: "message"; role: "system" | "user" | "assistant"; content: string }
  | { type: "tool_call"; callId: string; name: string; arguments: string }
  | { type: "tool_result"; callId: string; output: string };

export type ToolDefinition = {
  name: string;
  description: string;
  parameters: Record<string, unknown>;
};

export type ToolChoice = "auto" | "required" | { name: string };

export type OracleRequest = {
  messages: OracleMessage[];
  tools: ToolDefinition[];
  toolChoice?: ToolChoice;
  signal?: AbortSignal;
};

export type OracleToolCall = {
  id: string;
  name: string;
  arguments: string;
};

export type OracleResponse = { type: "tool_calls"; calls: OracleToolCall[] } | { type: "text"; text: string };

export interface LlmOracle {
  invoke(request: OracleRequest): Promise<OracleResponse>;
}
