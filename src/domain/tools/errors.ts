export type RejectReasonCode =
  | "SourceTooLarge"
  | "SyntaxInvalid"
  | "MultipleOrZeroDefinitions"
  | "UnexpectedTopLevelStatement"
  | "NameMismatch"
  | "ForbiddenConstruct"
  | "DisallowedImport";

export interface Rejection {
  code: RejectReasonCode;
  detail: string;
  /** Set for ForbiddenConstruct. */
  construct?: string;
  /** Set for DisallowedImport. */
  module?: string;
}

export type IoErrorKind = "InvalidName" | "ReservedName" | "NoSpace" | "WriteFailed";

export interface IoError {
  code: "IoError";
  kind: IoErrorKind;
  name: string;
  detail: string;
}

export interface InvalidParameterSchemaError {
  code: "InvalidParameterSchema";
  name: string;
  detail: string;
}

export type ProvisionError = Rejection | InvalidParameterSchemaError | IoError;

export type LoadFailureReason = "MissingTag" | "TagMismatch" | "PolicyViolation" | "ImportFailed";

export interface LoadFailure {
  name: string;
  reason: LoadFailureReason;
  detail: string;
}

export type InvokeError =
  | { code: "UnknownTool"; name: string }
  | { code: "ArgumentShapeMismatch"; name: string; detail: string }
  | { code: "InvocationError"; name: string; cause: string };

export class MetadataDocumentError extends Error {
  constructor(readonly documentPath: string, detail: string) {
    super(`Metadata document ${documentPath} is unreadable: ${detail}`);
    this.name = "MetadataDocumentError";
  }
}

export function formatInvokeError(error: InvokeError): string {
  switch (error.code) {
    case "UnknownTool":
      return `Tool "${error.name}" is not registered.`;
    case "ArgumentShapeMismatch":
      return `Arguments for "${error.name}" do not match its schema: ${error.detail}`;
    case "InvocationError":
      return `Tool "${error.name}" failed: ${error.cause}`;
  }
}
