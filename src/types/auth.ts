/**
 * Actor Types
 */

/**
 * Actor Context - who is performing the action
 * Every service method receives this context; it travels into logs and
 * event payloads so an operation can be traced end to end.
 */
export interface ActorContext {
  type: 'service' | 'admin' | 'system' | 'scheduler';
  requestId: string;
  clientId?: string;
}

/**
 * System actor for startup tasks and scripts
 */
export const SYSTEM_ACTOR: ActorContext = {
  type: 'system',
  requestId: 'system',
};

/**
 * Actor used by the lifecycle sweeps
 */
export function schedulerActor(job: string, runId: string): ActorContext {
  return {
    type: 'scheduler',
    requestId: `${job}-${runId}`,
  };
}
