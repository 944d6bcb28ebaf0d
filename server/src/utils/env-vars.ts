import { z } from "zod";

const envScheme = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  APP_PORT: z
    .string()
    .optional()
    .transform((str) => (str && parseInt(str)) || 8080),
  MAX_FILE_SIZE: z
    .string()
    .optional()
    // Default file size is 5MB
    .transform((str) => (str && parseInt(str)) || 5242880),
  SESSION_IDLE_MINUTES: z
    .string()
    .optional()
    .transform((str) => (str && parseInt(str)) || 60),
  STATIC_ROOT: z.string().default("./client/dist"),
  // Credentials for an external extraction service, not read by the mock extractor
  GOOGLE_APPLICATION_CREDENTIALS: z.string().optional(),
});

const env = envScheme.parse(process.env);

export default env;
