import { describe, it, expect, vi, afterEach, afterAll } from 'vitest';
import { InvokeCommand, LambdaClient } from '@aws-sdk/client-lambda';
import { mockClient } from 'aws-sdk-client-mock';
import type { AsyncInvoker } from '../../../src/aws/LambdaContinuationTrigger.js';
import { LambdaContinuationTrigger, lambdaInvoker } from '../../../src/aws/LambdaContinuationTrigger.js';

describe('LambdaContinuationTrigger', () => {
  it('should invoke the function with the triggering event and the resume offset', async () => {
    const invoke = vi.fn<AsyncInvoker>(() => Promise.resolve());
    const event = { Records: [{ s3: { bucket: { name: 'imports' } } }], byte_offset: 100 };
    const trigger = new LambdaContinuationTrigger(invoke, 'braze-import', event);

    await trigger.trigger({ importId: 's3://imports/events.json', byteOffset: 4096 });

    expect(invoke).toHaveBeenCalledWith('braze-import', {
      Records: [{ s3: { bucket: { name: 'imports' } } }],
      byte_offset: 4096,
    });
  });

  it('should propagate invocation failures', async () => {
    const invoke = vi.fn<AsyncInvoker>(() => Promise.reject(new Error('TooManyRequestsException')));
    const trigger = new LambdaContinuationTrigger(invoke, 'braze-import', {});

    await expect(trigger.trigger({ importId: 'x', byteOffset: 1 })).rejects.toThrow('TooManyRequestsException');
  });
});

describe('lambdaInvoker', () => {
  const lambdaMock = mockClient(LambdaClient);

  afterEach(() => {
    lambdaMock.reset();
  });

  afterAll(() => {
    lambdaMock.restore();
  });

  it('should send an asynchronous Invoke with a JSON payload', async () => {
    lambdaMock.on(InvokeCommand).resolves({ StatusCode: 202 });
    const invoke = lambdaInvoker(new LambdaClient({ region: 'us-east-1' }));

    await invoke('braze-import', { byte_offset: 4096 });

    const input = lambdaMock.commandCalls(InvokeCommand)[0]?.args[0].input;
    expect(input?.FunctionName).toBe('braze-import');
    expect(input?.InvocationType).toBe('Event');
    const payload = input?.Payload;
    expect(payload).toBeInstanceOf(Uint8Array);
    const text = payload instanceof Uint8Array ? Buffer.from(payload).toString('utf-8') : '';
    expect(text).toBe('{"byte_offset":4096}');
  });
});
