/**
 * Core domain types for usage extraction.
 */

export type ElementKind = "module" | "class" | "function" | "method" | "parameter";

export type ParameterKind =
  | "positional_only"
  | "positional_or_keyword"
  | "var_positional"
  | "keyword_only"
  | "var_keyword";

/**
 * How a method receives its implicit first argument.
 * `instance`: regular method (self), `class`: classmethod (cls), `none`: staticmethod.
 */
export type ReceiverKind = "instance" | "class" | "none";

export interface ApiParameter {
  name: string;
  kind: ParameterKind;
  /** Source text of the default value, or null when the parameter is required */
  defaultValue: string | null;
}

export interface ApiElement {
  /** Fully-qualified dotted path, e.g. "sklearn.svm.SVC.fit" */
  qname: string;
  kind: ElementKind;
  /** Formal parameters without the implicit receiver */
  parameters: ApiParameter[];
  receiver?: ReceiverKind;
}

/**
 * Public surface of the analysed library, supplied by the API-description collaborator.
 */
export interface ApiDescription {
  package: string;
  version?: string;
  elements: ApiElement[];
  /** Re-exported path -> canonical path */
  aliases: Record<string, string>;
}

export interface Location {
  /** 1-indexed line number */
  line: number;
  /** 1-indexed column number */
  column: number;
}

export type ParseStatus = "parsed" | "syntax-error";

export interface SourceFile {
  /** Path relative to the corpus root, "/"-separated */
  path: string;
  text: string;
}

// ============================================================================
// Value signatures
// ============================================================================

export type ValueSignature =
  | { kind: "literal"; value: string }
  | { kind: "shape"; shape: string }
  | { kind: "default" }
  | { kind: "unknown" };

/** Value signature key -> occurrence count */
export type Histogram = Record<string, number>;

// ============================================================================
// Call sites
// ============================================================================

export type UnresolvedReason =
  | "unbound-name"
  | "shadowed"
  | "ambiguous"
  | "dynamic"
  | "not-in-api"
  | "no-constructor";

export type CallTarget =
  | {
      kind: "resolved";
      qname: string;
      /** First positional argument is the explicit receiver (Cls.method(obj, ...)) */
      explicitReceiver: boolean;
    }
  | { kind: "unresolved"; reason: UnresolvedReason; callee: string };

export type CallArgument =
  | { kind: "positional"; value: ValueSignature }
  | { kind: "keyword"; name: string; value: ValueSignature }
  | { kind: "star" }
  | { kind: "double_star" };

export interface CallSite {
  file: string;
  location: Location;
  target: CallTarget;
  arguments: CallArgument[];
}

/** Parameter name (or variadic bucket) -> observed signature */
export type ParameterBindings = Map<string, ValueSignature>;

/** Synthetic bucket names for arguments absorbed by *args / **kwargs. */
export const VARIADIC_POSITIONAL_BUCKET = "*";
export const VARIADIC_KEYWORD_BUCKET = "**";

// ============================================================================
// Aggregates
// ============================================================================

export interface PartialAggregate {
  /** qname -> number of resolved call sites */
  callCounts: Record<string, number>;
  /** qname -> number of files with at least one resolved call site */
  fileCounts: Record<string, number>;
  /** qname -> parameter -> histogram */
  parameterHistograms: Record<string, Record<string, Histogram>>;
  unresolvedCalls: number;
}

export interface Checkpoint {
  file: string;
  fingerprint: string;
  processed: true;
  aggregate: PartialAggregate;
}

// ============================================================================
// Run reporting
// ============================================================================

export type FileOutcome = "processed" | "skipped" | "irrelevant" | "failed";

export type FailureKind = "read" | "parse" | "checkpoint";

export interface FileFailure {
  file: string;
  kind: FailureKind;
  message: string;
  location?: Location;
}

export interface RunSummary {
  filesTotal: number;
  processed: number;
  skipped: number;
  irrelevant: number;
  failed: number;
  parseFailures: number;
  readFailures: number;
  checkpointFailures: number;
  resolvedCalls: number;
  unresolvedCalls: number;
  failures: FileFailure[];
}

/**
 * Document handed to the improvement step.
 */
export interface UsageReport {
  package: string;
  version?: string;
  calls: Record<string, number>;
  files: Record<string, number>;
  parameters: Record<string, Record<string, Histogram>>;
  unresolvedCalls: number;
}
