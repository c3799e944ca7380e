import { InvokeCommand, type LambdaClient } from '@aws-sdk/client-lambda';
import type { ContinuationRequest, ContinuationTrigger } from '@trackimport/core';

/** Fire-and-forget invocation of a function with a JSON payload. */
export type AsyncInvoker = (functionName: string, payload: Readonly<Record<string, unknown>>) => Promise<void>;

/** `AsyncInvoker` over the Lambda API, `InvocationType: 'Event'`. */
export function lambdaInvoker(client: LambdaClient): AsyncInvoker {
  return async (functionName, payload) => {
    await client.send(
      new InvokeCommand({
        FunctionName: functionName,
        InvocationType: 'Event',
        Payload: Buffer.from(JSON.stringify(payload)),
      }),
    );
  };
}

/**
 * Continues an import by invoking the running function again, asynchronously,
 * with the event it was started with plus the `byte_offset` to resume from.
 */
export class LambdaContinuationTrigger implements ContinuationTrigger {
  constructor(
    private readonly invoke: AsyncInvoker,
    private readonly functionName: string,
    private readonly event: Readonly<Record<string, unknown>>,
  ) {}

  async trigger(request: ContinuationRequest): Promise<void> {
    await this.invoke(this.functionName, { ...this.event, byte_offset: request.byteOffset });
  }
}
