// packages/channels/src/context.ts
import { newTraceId } from '@chankv/utils';

/** Per-operation values passed explicitly down the call chain. */
export type OperationContext = {
  readonly traceId: string;
};

export function createOperationContext(traceId: string = newTraceId()): OperationContext {
  return { traceId };
}
