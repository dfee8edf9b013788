import { Pool } from "pg";
import type { AppConfig } from "./config";

export function createPool(database: AppConfig["database"]) {
  return new Pool({
    host: database.host,
    port: database.port,
    user: database.user,
    password: database.password,
    database: database.database,
    max: 5,
  });
}
