export { renderPipelineSuccess, type PipelineSuccessData } from './pipelineSuccess.js';
export { renderPipelineFailure, type PipelineFailureData } from './pipelineFailure.js';
