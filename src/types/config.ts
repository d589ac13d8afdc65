import { z } from 'zod';

export const CONFIG_FILENAME = 'opsdeck.config.json';

export const ImageConfigSchema = z.object({
  namespace: z.string().min(1),
  repository: z.string().min(1),
});

export const ConsoleConfigSchema = z.object({
  composeFile: z.string().min(1).default('docker-compose.yml'),
  image: ImageConfigSchema.default({ namespace: 'opsdeck', repository: 'stack' }),
  /** service name → Dockerfile path, relative to the project root */
  services: z.record(z.string().min(1)).default({}),
  buildArgs: z.record(z.string()).default({}),
});

export type ImageConfig = z.infer<typeof ImageConfigSchema>;
export type ConsoleConfig = z.infer<typeof ConsoleConfigSchema>;

export const DEFAULT_CONFIG: ConsoleConfig = ConsoleConfigSchema.parse({});
