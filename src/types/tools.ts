export type ToolName =
  | 'lookup_product'
  | 'estimate_repair'
  | 'record_customer_interest'
  | 'record_feedback'
  | 'record_service_feedback';

export type ToolErrorKind = 'InvalidArguments' | 'UnknownTool' | 'NotFound' | 'HandlerFailure';

export interface ToolCallRequest {
  id: string;
  name: string;
  arguments: Record<string, unknown>;
}

export interface ToolSuccess {
  ok: true;
  data: Record<string, unknown>;
}

export interface ToolFailure {
  ok: false;
  error: ToolErrorKind;
  message: string;
  details?: Record<string, unknown>;
}

export type ToolCallResult = ToolSuccess | ToolFailure;

export type ArgPrimitive = 'string' | 'number' | 'boolean';

export interface ArgDescriptor {
  type: ArgPrimitive;
  required: boolean;
  description?: string;
  enum?: string[];
}

/** JSON-schema shape handed to the reasoning backend. */
export interface ToolSchema {
  name: ToolName;
  description: string;
  inputSchema: {
    type: 'object';
    properties: Record<string, { type: ArgPrimitive; description?: string; enum?: string[] }>;
    required: string[];
  };
}

export interface ToolContext {
  sessionId: string;
}
