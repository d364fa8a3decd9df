export interface EventEnvelope {
  id: string;
  type: string;
  timestamp: string;
  sessionId: string;
  payload: Record<string, unknown>;
}

export interface FunctionToolSpec {
  name: string;
  description: string;
  parameters: Record<string, unknown>;
}

export type Role = "user" | "assistant" | "system";

export interface ChatMessage {
  id: string;
  role: Role;
  text: string;
  images: string[];
  toolsUsed: string[];
  createdAt: string;
}

// ─── Model output items ─────────────────────────────────────────────────────

export interface SafetyCheck {
  id: string;
  code: string;
  message: string;
}

export interface ControlAction {
  type: string;
  [field: string]: unknown;
}

export interface ActionResult {
  visualArtifact?: string;
  currentLocation?: string;
}

export interface FunctionCallItem {
  type: "function_call";
  id: string;
  callId: string;
  name: string;
  arguments: string;
  status?: string;
}

export interface ComputerCallItem {
  type: "computer_call";
  id: string;
  callId: string;
  action: ControlAction | null;
  pendingSafetyChecks: SafetyCheck[];
  status?: string;
}

/** Opaque reasoning state; `summary` is null when the server has not filled it in yet. */
export interface ReasoningItem {
  type: "reasoning";
  id: string;
  summary: string[] | null;
  encryptedContent?: string;
}

export interface MessageItem {
  type: "message";
  id: string;
  text: string;
}

export interface ConnectorCallItem {
  type: "mcp_call";
  id: string;
  name: string;
  serverLabel: string;
  status?: string;
  error?: string;
}

export interface ConnectorApprovalItem {
  type: "mcp_approval_request";
  id: string;
  name: string;
  serverLabel: string;
  arguments: string;
}

export interface ImageGenerationItem {
  type: "image_generation_call";
  id: string;
  result?: string;
  status?: string;
}

export interface UnknownItem {
  type: "unknown";
  id: string;
  kind: string;
}

export type OutputItem =
  | FunctionCallItem
  | ComputerCallItem
  | ReasoningItem
  | MessageItem
  | ConnectorCallItem
  | ConnectorApprovalItem
  | ImageGenerationItem
  | UnknownItem;

export interface ServiceErrorDetail {
  code?: string;
  message: string;
}

export interface ModelResponse {
  id: string;
  status: string;
  output: OutputItem[];
  outputText: string;
  error?: ServiceErrorDetail;
}

export interface StreamChunk {
  kind: string;
  responseId?: string;
  item?: OutputItem;
  delta?: string;
  response?: ModelResponse;
  error?: ServiceErrorDetail;
}

// ─── Inputs sent back to the model ──────────────────────────────────────────

export interface TurnInput {
  text: string;
}

export interface FunctionOutputInput {
  type: "function_call_output";
  callId: string;
  output: string;
}

export interface ActionOutputInput {
  type: "computer_call_output";
  callId: string;
  screenshot: string;
  acknowledgedSafetyChecks: SafetyCheck[];
  /** Page the executor ended on; browser environments report it back to the model. */
  currentUrl?: string;
}

export interface ConnectorApprovalInput {
  type: "mcp_approval_response";
  approvalRequestId: string;
  approve: boolean;
  reason?: string;
}

export type ContinuationInput = FunctionOutputInput | ActionOutputInput | ConnectorApprovalInput;

// ─── Collaborators ──────────────────────────────────────────────────────────

export interface ModelTransport {
  readonly name: string;
  streamTurn(input: TurnInput, continuationId: string | null, signal: AbortSignal): AsyncIterable<StreamChunk>;
  sendOneShot(input: TurnInput, continuationId: string | null, signal: AbortSignal): Promise<ModelResponse>;
  resumeStream(
    outputs: ContinuationInput[],
    continuationId: string | null,
    reasoning: ReasoningItem[] | null,
    signal: AbortSignal,
  ): AsyncIterable<StreamChunk>;
  resume(
    outputs: ContinuationInput[],
    continuationId: string | null,
    reasoning: ReasoningItem[] | null,
    signal: AbortSignal,
  ): Promise<ModelResponse>;
  fetchFullResponse(continuationId: string): Promise<ModelResponse>;
}

export interface ActionExecutor {
  executeAction(action: ControlAction): Promise<ActionResult>;
}

export interface FunctionExecutor {
  executeNamedFunction(name: string, argsJSON: string): Promise<string>;
}

// ─── Engine surface ─────────────────────────────────────────────────────────

export type EngineStatus =
  | { kind: "idle" }
  | { kind: "connecting" }
  | { kind: "thinking" }
  | { kind: "streaming-text" }
  | { kind: "running-tool"; name: string }
  | { kind: "using-control-action" }
  | { kind: "awaiting-approval" }
  | { kind: "generating-image" }
  | { kind: "done" };

export interface SafetyApprovalRequest {
  action: ControlAction;
  callId: string;
  continuationId: string;
  messageId: string;
  checks: SafetyCheck[];
}

export interface ConnectorApprovalRequest {
  approvalRequestId: string;
  name: string;
  serverLabel: string;
  arguments: string;
  messageId: string;
  continuationId: string;
}

export type EngineEvent =
  | { type: "message.appended"; message: ChatMessage }
  | { type: "message.updated"; message: ChatMessage }
  | { type: "message.removed"; messageId: string }
  | { type: "status"; status: EngineStatus }
  | { type: "activity"; lines: string[] }
  | { type: "approval.requested"; request: SafetyApprovalRequest }
  | { type: "approval.cleared" }
  | { type: "connector.approval.requested"; request: ConnectorApprovalRequest }
  | { type: "turn.settled"; continuationId: string | null };

export type EngineListener = (event: EngineEvent) => void;
