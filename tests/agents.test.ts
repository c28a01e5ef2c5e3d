import { describe, it, expect } from 'vitest';
import { signInvocation } from '../src/core/agents.js';
import { DepthViolation, NotFoundError, SchemaViolation, SignatureInvalid } from '../src/core/errors.js';
import { makeEngine, SIGNING_KEY, T0 } from './helpers.js';

describe('AgentTracker', () => {
  it('records signed depth-1 invocations and counts distinct agents', async () => {
    const { engine } = await makeEngine();
    const task = await engine.tasks.create('rate-limit');
    const record = (agentName: string, invokedAt: number) =>
      engine.agents.record(task.id, {
        agentName,
        depth: 1,
        invokedAt,
        signature: signInvocation(SIGNING_KEY, { taskId: task.id, agentName, depth: 1, invokedAt })
      });

    const first = await record('implementer', T0);
    await record('implementer', T0 + 1);
    await record('reviewer', T0 + 2);

    expect(first).toMatchObject({ taskId: task.id, agentName: 'implementer', depth: 1, completedAt: null, status: null });
    expect(engine.agents.count(task.id)).toBe(2);
    expect(engine.agents.list(task.id)).toHaveLength(3);
    expect((await engine.tasks.resolve(task.id)).invoked_agents).toEqual(['implementer', 'reviewer']);
  });

  it('does not count the orchestrator or failed agents', async () => {
    const { engine } = await makeEngine();
    const task = await engine.tasks.create('rate-limit');
    const sign = (agentName: string, depth: number) => signInvocation(SIGNING_KEY, { taskId: task.id, agentName, depth, invokedAt: T0 });

    await engine.agents.record(task.id, { agentName: 'orchestrator', depth: 0, invokedAt: T0, signature: sign('orchestrator', 0) });
    const tester = await engine.agents.record(task.id, { agentName: 'tester', depth: 1, invokedAt: T0, signature: sign('tester', 1) });
    expect(engine.agents.count(task.id)).toBe(1);

    const done = engine.agents.complete(tester.id, 'failure');
    expect(done).toMatchObject({ status: 'failure', completedAt: T0 });
    expect(engine.agents.count(task.id)).toBe(0);
    expect(() => engine.agents.complete(tester.id, 'success')).toThrow(SchemaViolation);
    expect(() => engine.agents.complete('nope', 'success')).toThrow(NotFoundError);
  });

  it('rejects nested delegation and forged signatures without writing anything', async () => {
    const { engine } = await makeEngine();
    const task = await engine.tasks.create('rate-limit');
    const signature = signInvocation(SIGNING_KEY, { taskId: task.id, agentName: 'helper', depth: 2, invokedAt: T0 });

    await expect(engine.agents.record(task.id, { agentName: 'helper', depth: 2, invokedAt: T0, signature })).rejects.toBeInstanceOf(
      DepthViolation
    );
    await expect(
      engine.agents.record(task.id, { agentName: 'helper', depth: 1, invokedAt: T0, signature: 'ab'.repeat(32) })
    ).rejects.toBeInstanceOf(SignatureInvalid);
    await expect(
      engine.agents.record(task.id, { agentName: 'helper', depth: 1, invokedAt: T0 + 5, signature: signInvocation(SIGNING_KEY, { taskId: task.id, agentName: 'helper', depth: 1, invokedAt: T0 }) })
    ).rejects.toBeInstanceOf(SignatureInvalid);
    expect(engine.agents.list(task.id)).toEqual([]);
  });

  it('refuses every invocation when no signing key is configured', async () => {
    const { engine } = await makeEngine({ signingKey: null });
    const task = await engine.tasks.create('rate-limit');
    await expect(
      engine.agents.record(task.id, { agentName: 'helper', depth: 1, invokedAt: T0, signature: 'ab'.repeat(32) })
    ).rejects.toMatchObject({ message: 'Invocation signature rejected: no orchestrator signing key is configured' });
  });
});
