// ./types/env.ts
export interface Env {
  // Logging
  RECCHAIN_LOG_LEVEL: string;
  RECCHAIN_LOG_PATH: string;

  // Result policy
  RECCHAIN_TEXT_PREFIX: string;
  RECCHAIN_RECORD_STAGES: string;

  // Host-function bridge
  RECCHAIN_HOST_COMMENTS: string;
}
