export { getPipelineEnv, parsePipelineEnv, resetPipelineEnv, type PipelineEnv } from './config.js';
