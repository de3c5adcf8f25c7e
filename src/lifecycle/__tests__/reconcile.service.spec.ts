import { Logger } from '@nestjs/common';
import { createClusterHarness } from '../../../test/helpers/cluster-harness';
import { silenceNestLogger } from '../../../test/helpers/silence-logger';

describe('ReconcileService', () => {
  let restoreLogger: () => void;

  beforeAll(() => {
    restoreLogger = silenceNestLogger(['log', 'warn', 'error', 'debug']);
  });

  afterAll(() => {
    restoreLogger();
  });

  it('should do nothing when disabled', async () => {
    const harness = await createClusterHarness();

    await expect(harness.reconcile.reconcile()).resolves.toBeNull();
    expect(harness.supervisor.calls).toEqual([]);
  });

  it('should converge the current topology when enabled', async () => {
    const harness = await createClusterHarness({ config: { reconcile: { enabled: true } } });

    const report = await harness.reconcile.reconcile();

    expect(report?.operation).toBe('converge');
    expect(report?.overall).toBe('Converged');
    expect(harness.supervisor.callCount('start')).toBe(3);
  });

  it('should skip the tick while another operation is in flight', async () => {
    const harness = await createClusterHarness({ config: { reconcile: { enabled: true } } });

    const running = harness.lifecycle.converge(harness.topology.declared());
    const skipped = await harness.reconcile.reconcile();
    await running;

    expect(skipped).toBeNull();
    expect(harness.supervisor.callCount('start')).toBe(3);
  });

  it('should log and swallow a failed converge', async () => {
    const harness = await createClusterHarness({ config: { reconcile: { enabled: true } } });
    jest.spyOn(harness.lifecycle, 'converge').mockRejectedValue(new Error('docker daemon went away'));

    await expect(harness.reconcile.reconcile()).resolves.toBeNull();
    expect(Logger.prototype.error).toHaveBeenCalledWith('Reconcile failed: docker daemon went away');
  });
});
