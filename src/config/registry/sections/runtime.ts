/**
 * Runtime Configuration Section
 */

import { z } from 'zod';
import type { ConfigOptionMeta, ConfigSectionMeta } from '../types.js';

const options = {
  nodeEnv: {
    envKey: 'NODE_ENV',
    defaultValue: 'development',
    description: 'Node environment. Production disables pretty log output.',
    schema: z.string(),
  },
} satisfies Record<string, ConfigOptionMeta>;

export const runtimeSection = {
  name: 'runtime',
  description: 'Process runtime configuration.',
  options,
  schema: z.object({
    nodeEnv: options.nodeEnv.schema,
  }),
} satisfies ConfigSectionMeta;
