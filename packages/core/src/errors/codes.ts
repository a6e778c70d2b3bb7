/**
 * Error Code Infrastructure
 * Stable error codes shared by every resolution boundary.
 */

// Stable error codes grouped by phase
export enum ErrorCode {
  // Configuration Errors (E100–E199), raised at registration time
  INVALID_ARGUMENT = 'E100',
  DUPLICATE_REGISTRATION = 'E101',
  PROPERTY_NOT_FOUND = 'E102',
  INHERITED_PROPERTY = 'E103',

  // Resolution Errors (E200–E299), raised while fuzzing
  RULE_NOT_FOUND = 'E200',

  // Equality Errors (E300–E399)
  AMBIGUOUS_EQUALITY = 'E300',

  // Generation Errors (E400–E499)
  RETRY_EXHAUSTED = 'E400',

  // Access Errors (E500–E599)
  ACCESS_DENIED = 'E500',
}

export type ErrorPhase = 'configuration' | 'resolution' | 'equality' | 'generation' | 'access';

export const PHASE_BY_CODE = {
  [ErrorCode.INVALID_ARGUMENT]: 'configuration',
  [ErrorCode.DUPLICATE_REGISTRATION]: 'configuration',
  [ErrorCode.PROPERTY_NOT_FOUND]: 'configuration',
  [ErrorCode.INHERITED_PROPERTY]: 'configuration',
  [ErrorCode.RULE_NOT_FOUND]: 'resolution',
  [ErrorCode.AMBIGUOUS_EQUALITY]: 'equality',
  [ErrorCode.RETRY_EXHAUSTED]: 'generation',
  [ErrorCode.ACCESS_DENIED]: 'access',
} satisfies Record<ErrorCode, ErrorPhase>;

export function getErrorPhase(code: ErrorCode): ErrorPhase {
  return PHASE_BY_CODE[code];
}
