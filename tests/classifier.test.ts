import { classifyContainer, isImagePullReason, isKnownWaitingReason } from '../src/core/classifier';
import { container, waiting } from './helpers/fake-cluster';

describe('classifyContainer', () => {
  it('should classify a ready running container as healthy', () => {
    expect(classifyContainer(container('app', { kind: 'running' }, true))).toEqual({ kind: 'healthy-running' });
  });

  it('should require a log scan for a running container that is not ready', () => {
    expect(classifyContainer(container('app', { kind: 'running' }, false))).toEqual({ kind: 'requires-log-scan' });
  });

  it.each(['ImagePullBackOff', 'ErrImagePull', 'CreateContainerConfigError'])(
    'should explain waiting reason %s directly',
    (reason) => {
      const result = classifyContainer(container('app', waiting(reason, 'details here')));

      expect(result).toEqual({ kind: 'known-reason', reason, message: 'details here' });
    },
  );

  it('should require a log scan for other waiting reasons', () => {
    expect(classifyContainer(container('app', waiting('CrashLoopBackOff', 'back-off 5m0s')))).toEqual({
      kind: 'requires-log-scan',
    });
  });

  it('should require a log scan for terminated containers', () => {
    const terminated = container('app', { kind: 'terminated', reason: 'Error', message: '', exitCode: 1 });

    expect(classifyContainer(terminated)).toEqual({ kind: 'requires-log-scan' });
  });

  it('should require a log scan for an unknown state', () => {
    expect(classifyContainer(container('app', { kind: 'unknown' }))).toEqual({ kind: 'requires-log-scan' });
  });

  it('should match reasons exactly', () => {
    expect(classifyContainer(container('app', waiting('imagepullbackoff')))).toEqual({ kind: 'requires-log-scan' });
  });

  it('should return the same classification for identical snapshots', () => {
    const snapshot = container('app', waiting('ErrImagePull', 'pull access denied'));

    expect(classifyContainer(snapshot)).toEqual(classifyContainer({ ...snapshot }));
  });
});

describe('reason guards', () => {
  it('should recognise only the known waiting reasons', () => {
    expect(isKnownWaitingReason('ImagePullBackOff')).toBe(true);
    expect(isKnownWaitingReason('CreateContainerConfigError')).toBe(true);
    expect(isKnownWaitingReason('ContainerCreating')).toBe(false);
  });

  it('should separate image pull reasons from configuration errors', () => {
    expect(isImagePullReason('ImagePullBackOff')).toBe(true);
    expect(isImagePullReason('ErrImagePull')).toBe(true);
    expect(isImagePullReason('CreateContainerConfigError')).toBe(false);
  });
});
