export { createCommandSampler } from './sampler';
export { parseColorOutput } from './helpers';
export type { CommandSamplerConfig, ExecFileAPI } from './types';
