export {
  createDocumentArena,
  type DelegationDocument,
  type DocumentArena,
} from "./arena";
export {
  type DelegationFinding,
  type DelegationPath,
  type DelegationResult,
  type IncludePlaceholder,
  type PathStep,
  type PlaceholderReason,
  resolveDelegation,
} from "./resolver";
