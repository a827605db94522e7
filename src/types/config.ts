import type { z } from "zod";
import type { configSchema } from "../config/schema.js";

/** Full server configuration, with every default applied. */
export type AppConfig = z.output<typeof configSchema>;
