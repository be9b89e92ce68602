import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { z } from "zod";
import { ConfigError, isoDateSchema, localTimeSchema } from "@farmdesk/shared";

export const openingWindowSchema = z.object({
  // ISO weekday, 1 = Monday ... 7 = Sunday.
  weekday: z.number().int().min(1).max(7),
  start: localTimeSchema,
  end: localTimeSchema
});

export const serviceDefinitionSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  aliases: z.array(z.string().min(2)).default([]),
  durationMinutes: z.number().int().positive(),
  resourceIds: z.array(z.string().min(1)).min(1),
  openingHours: z.array(openingWindowSchema).min(1),
  lastStart: localTimeSchema.optional()
});

export const closureSchema = z.object({
  from: isoDateSchema,
  to: isoDateSchema,
  label: z.string().min(1)
});

export const businessConfigSchema = z.object({
  name: z.string().min(1),
  address: z.string().min(1),
  phone: z.string().min(1),
  email: z.string().email(),
  website: z.string().url().optional(),
  timezone: z.string().default("Europe/Ljubljana"),
  leadTimeMinutes: z.number().int().min(0).default(60),
  slotGranularityMinutes: z.number().int().positive().default(30),
  alternativeSearchDays: z.number().int().positive().default(14),
  closures: z.array(closureSchema).default([]),
  services: z.array(serviceDefinitionSchema).min(1)
});

export type BusinessConfig = z.infer<typeof businessConfigSchema>;
export type BusinessConfigInput = z.input<typeof businessConfigSchema>;
export type ServiceDefinition = z.infer<typeof serviceDefinitionSchema>;
export type Closure = z.infer<typeof closureSchema>;

export function parseBusinessConfig(raw: unknown): BusinessConfig {
  const parsed = businessConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError("Invalid business configuration", {
      cause: parsed.error,
      context: { issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`) }
    });
  }
  const ids = new Set<string>();
  for (const service of parsed.data.services) {
    if (ids.has(service.id)) {
      throw new ConfigError(`Duplicate service id ${service.id}`);
    }
    ids.add(service.id);
  }
  return parsed.data;
}

export async function loadBusinessConfig(path: string): Promise<BusinessConfig> {
  const fullPath = resolve(path);
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(fullPath, "utf8"));
  } catch (error) {
    throw new ConfigError(`Cannot read business configuration from ${fullPath}`, { cause: error });
  }
  return parseBusinessConfig(raw);
}

export function findService(config: BusinessConfig, serviceId: string): ServiceDefinition | undefined {
  return config.services.find((service) => service.id === serviceId);
}
