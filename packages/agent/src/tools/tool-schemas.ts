import { z } from "zod";
import { MalformedToolCallError, isoDateSchema, localTimeSchema } from "@farmdesk/shared";
import type { ServiceDefinition } from "@farmdesk/domain";
import type { OracleToolCall, ToolDefinition } from "../oracle/types";

export const toolSchemas = {
  check_availability: z.object({
    service: z.string().min(1),
    date: isoDateSchema,
    time: localTimeSchema
  }),
  update_reservation_draft: z.object({
    name: z.string().trim().min(2).optional(),
    phone: z.string().trim().min(6).optional(),
    email: z.string().trim().email().optional(),
    note: z.string().trim().max(300).optional()
  })
};

export type ParsedToolCall =
  | { id: string; name: "check_availability"; args: z.infer<(typeof toolSchemas)["check_availability"]> }
  | { id: string; name: "update_reservation_draft"; args: z.infer<(typeof toolSchemas)["update_reservation_draft"]> };

export function toolDefinitions(services: readonly ServiceDefinition[]): ToolDefinition[] {
  return [
    {
      name: "check_availability",
      description:
        "Check whether a service can be reserved at a local date and time. Must be called before saying anything about free or taken slots.",
      parameters: {
        type: "object",
        properties: {
          service: { type: "string", enum: services.map((service) => service.id) },
          date: { type: "string", description: "Local date, YYYY-MM-DD" },
          time: { type: "string", description: "Local start time, HH:MM (24h)" }
        },
        required: ["service", "date", "time"],
        additionalProperties: false
      }
    },
    {
      name: "update_reservation_draft",
      description: "Store contact details or a note the user gave for the reservation.",
      parameters: {
        type: "object",
        properties: {
          name: { type: "string" },
          phone: { type: "string" },
          email: { type: "string" },
          note: { type: "string" }
        },
        additionalProperties: false
      }
    }
  ];
}

function parseArguments(call: OracleToolCall): unknown {
  try {
    return JSON.parse(call.arguments);
  } catch (error) {
    throw new MalformedToolCallError(call.name, "Tool arguments are not valid JSON", { cause: error });
  }
}

function validate<T extends z.ZodTypeAny>(call: OracleToolCall, schema: T): z.infer<T> {
  const parsed = schema.safeParse(parseArguments(call));
  if (!parsed.success) {
    throw new MalformedToolCallError(call.name, "Tool arguments do not match the schema", {
      cause: parsed.error,
      context: { issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`) }
    });
  }
  return parsed.data;
}

export function parseToolCall(call: OracleToolCall): ParsedToolCall {
  switch (call.name) {
    case "check_availability":
      return { id: call.id, name: "check_availability", args: validate(call, toolSchemas.check_availability) };
    case "update_reservation_draft":
      return { id: call.id, name: "update_reservation_draft", args: validate(call, toolSchemas.update_reservation_draft) };
    default:
      throw new MalformedToolCallError(call.name, `Unknown tool ${call.name}`);
  }
}
