/**
 * AIP model, naming policies and the stages that shape an AIP folder.
 *
 * @module aip
 */

export type {
  AipOutcome,
  AipState,
  AipType,
  AipWorkItem,
  ErrorKind,
  ResolvedIdentity,
  StageOutcome,
  ValidationDiagnostics,
} from './types.js';
export { AIP_STATES, ERROR_KINDS } from './types.js';
export { VALID_TRANSITIONS, isTerminal, transition } from './state-machine.js';
export type {
  CompoundNamingPolicy,
  DepartmentName,
  DepartmentPolicy,
  IdentifierNamingPolicy,
  NamingResult,
  ResolveIdentityOptions,
  TypeClassification,
} from './naming.js';
export {
  DEPARTMENT_POLICIES,
  classifyType,
  findDepartmentPolicy,
  namingStage,
  resolveIdentity,
} from './naming.js';
export { filterStage, removeDisallowedFiles, removeIncidentalFiles } from './content-filter.js';
export { METADATA_DIR, OBJECTS_DIR, createAipDirectories, restructureStage } from './restructure.js';
export {
  moveToErrorPartition,
  partitionPath,
  sidecarFileName,
  writeValidationSidecar,
} from './error-partition.js';
