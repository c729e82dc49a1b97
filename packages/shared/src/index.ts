export type {
  LabelMap,
  ContainerSpec,
  ServiceRecord,
  NetworkAttachment,
  TaskDesiredState,
  TaskRecord,
  IOrchestrator,
} from "./types/orchestrator.js";
export type {
  MonitoringNetworkSet,
  EndpointRecord,
  DiscoveryResult,
  PassSnapshot,
  DiscoveryHealth,
  HealthResponse,
} from "./types/discovery.js";
