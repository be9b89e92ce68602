import { drizzle } from "drizzle-orm/postgres-js";
import type { PostgresJsQueryResultHKT } from "drizzle-orm/postgres-js";
import type { PgDatabase } from "drizzle-orm/pg-core";
import postgres from "postgres";
import { loadConfig } from "@farmdesk/shared";
import * as schema from "./schema";

const { DATABASE_URL } = loadConfig();

// postgres-js connects lazily, so importing this module opens no socket.
const client = postgres(DATABASE_URL, { max: 10 });

export const db = drizzle(client, { schema });

export type DbClient = typeof db;

export type DbExecutor = PgDatabase<PostgresJsQueryResultHKT, typeof schema>;
