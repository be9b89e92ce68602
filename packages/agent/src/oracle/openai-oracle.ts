import OpenAI from "openai";
import type { FunctionTool, ResponseInputItem, ToolChoiceFunction, ToolChoiceOptions } from "openai/resources/responses/responses";
import { RoutingUnavailableError } from "@farmdesk/shared";
import type { LlmOracle, OracleMessage, OracleRequest, OracleResponse, ToolChoice, ToolDefinition } from "./types";

export type OpenAiOracleOptions = {
  apiKey: string;
  model: string;
  timeoutMs: number;
  temperature?: number;
};

function toInputItem(message: OracleMessage): ResponseInputItem {
  switch (message.type) {
    case "message":
      return { role: message.role, content: message.content };
    case "tool_call":
      return { type: "function_call", call_id: message.callId, name: message.name, arguments: message.arguments };
    case "tool_result":
      return { type: "function_call_output", call_id: message.callId, output: message.output };
  }
}

function toFunctionTool(tool: ToolDefinition): FunctionTool {
  return { type: "function", name: tool.name, description: tool.description, strict: false, parameters: tool.parameters };
}

function toToolChoice(choice: ToolChoice): ToolChoiceOptions | ToolChoiceFunction {
  return typeof choice === "string" ? choice : { type: "function", name: choice.name };
}

export class OpenAiOracle implements LlmOracle {
  private readonly client: OpenAI;

  constructor(private readonly options: OpenAiOracleOptions) {
    this.client = new OpenAI({ apiKey: options.apiKey, timeout: options.timeoutMs, maxRetries: 0 });
  }

  async invoke(request: OracleRequest): Promise<OracleResponse> {
    try {
      const response = await this.client.responses.create(
        {
          model: this.options.model,
          input: request.messages.map(toInputItem),
          temperature: this.options.temperature ?? 0.1,
          ...(request.tools.length > 0
            ? { tools: request.tools.map(toFunctionTool), tool_choice: toToolChoice(request.toolChoice ?? "auto") }
            : {})
        },
        { timeout: this.options.timeoutMs, ...(request.signal ? { signal: request.signal } : {}) }
      );

      const calls = response.output.flatMap((item) =>
        item.type === "function_call" ? [{ id: item.call_id, name: item.name, arguments: item.arguments }] : []
      );
      if (calls.length > 0) {
        return { type: "tool_calls", calls };
      }
      return { type: "text", text: response.output_text };
    } catch (error) {
      throw RoutingUnavailableError.from(error, { model: this.options.model });
    }
  }
}

export class DisabledOracle implements LlmOracle {
  async invoke(): Promise<OracleResponse> {
    throw new RoutingUnavailableError("LLM oracle is not configured");
  }
}
