import { z } from 'zod';

const port = z.number().int().min(1).max(65535);
const millis = z.number().int().min(0);

export const RunnerConfigSchema = z.object({
  scratch_dir: z.string().min(1),
  milter_port: port,
  verbosity: z.number().int().min(0).max(3),
  startup_grace_ms: millis,
  readiness_timeout_ms: millis,
  kill_timeout_ms: millis,
  build: z.object({
    // argv; "{output}" is replaced with the executable path, runs inside the test directory
    command: z.array(z.string()).min(1),
    timeout_ms: millis,
  }),
  exit_codes: z.object({
    skip: z.number().int(),
    clean: z.number().int(),
  }),
  smtp: z.object({
    host: z.string().min(1),
    // 0 disables the per-command timeout
    command_timeout_ms: millis,
  }),
  auth: z.object({
    default_password: z.string(),
    alternate: z.object({
      identity: z.string(),
      password: z.string(),
    }),
  }),
});

export type RunnerConfig = z.infer<typeof RunnerConfigSchema>;
