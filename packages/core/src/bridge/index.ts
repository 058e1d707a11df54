export {
  ResilientBridge,
  type ResilientBridgeOptions,
  type BridgeStateSource,
  type BridgeStateView,
} from './resilient-bridge';

export {
  PipelineBackend,
  type PipelineBackendOptions,
  type PipelineMetrics,
  type PipelineStage,
} from './pipeline-backend';

export { cacheKeyFor, createRequest, fingerprint } from './request';
