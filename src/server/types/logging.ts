export type OperationName = 'create' | 'create_batch' | 'claim' | 'revoke' | 'deposit';

export interface OperationRecord {
  id?: number;
  session_id: string;
  ip_address?: string;
  user_agent?: string;
  caller?: string;
  operation: OperationName;
  ticket_id?: number;
  created_at: string;
  completed_at?: string;
  duration_ms?: number;
  status?: 'success' | 'failed';
  error_kind?: string;
  error_message?: string;
}

// Request metadata attached by middleware
export interface RequestMetadata {
  session_id: string;
  ip_address: string;
  user_agent: string;
  // Resolved caller identity (X-Caller-Address), absent for anonymous requests
  caller?: string;
}
