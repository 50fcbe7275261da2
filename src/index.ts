// Document
export type {
  PlanDocument,
  GroupDecl,
  ProjectDecl,
  UserDecl,
  MemberDecl,
  LabelDecl,
  TimeboxDecl,
  EpicDecl,
  IssueDecl,
  DocumentIssue,
} from "./document/types.js";
export { planDocumentSchema, ROLE_ACCESS_LEVELS } from "./document/schema.js";
export { parseDocument, loadDocument } from "./document/loader.js";
export { validateDocument, summarizeDocument, type DocumentSummary } from "./document/validator.js";

// Engine
export type {
  RemotePlatform,
  RemoteEntity,
  RemoteUser,
  RemoteMember,
  ContainerRef,
  EntityDraft,
  EntityKind,
  EntityUpdate,
} from "./engine/platform.js";
export {
  DocumentError,
  TransportError,
  ContainerCreateError,
  ConflictError,
  RegistryError,
  type ReferenceGap,
  type TransportReason,
} from "./engine/errors.js";
export { CapabilityDescriptor, CapabilityProbe, type Capability } from "./engine/capabilities.js";
export { Registry, type RegistrySnapshot } from "./engine/registry.js";
export { walkDocument, type Visit } from "./engine/traversal.js";
export { Materializer, type DuplicatePolicy, type MaterializeOutcome } from "./engine/materializer.js";
export { RelationshipResolver } from "./engine/resolver.js";
export { quickActionIterationLinker, type IterationLinker } from "./engine/iteration-directive.js";
export { Trace, formatTraceEvent, type TraceEvent, type TraceAction } from "./engine/trace.js";
export { materializePlan, type RunOptions, type RunReport, type RelationshipMode } from "./engine/run.js";

// GitLab
export { GitLabClient, GitLabClientError, GitLabRequestError } from "./gitlab/client.js";
export { GitLabPlatform, tierCapabilities, type GitLabTier } from "./gitlab/platform.js";

// Config, reporting
export { loadConfig, ConfigError, CONFIG_FILE } from "./config/loader.js";
export { plansmithConfigSchema, type PlansmithConfig } from "./config/schema.js";
export { formatHumanReport } from "./reporter/human.js";
export { formatJsonReport } from "./reporter/json.js";
export { createLogger, silentLogger, type Logger } from "./utils/logger.js";
export { applyPlan, createGitLabPlatform, type ApplyInput } from "./apply.js";
