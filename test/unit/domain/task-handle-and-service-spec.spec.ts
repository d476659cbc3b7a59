import { describe, it, expect } from 'vitest';
import { TaskHandle } from '../../../src/domain/entities/task-handle.entity';
import { ServiceSpec } from '../../../src/domain/value-objects/service-spec.vo';
import { ResultLocationVO } from '../../../src/domain/value-objects/result-location.vo';

describe('TaskHandle', () => {
  it('should trim the task id and freeze the handle', () => {
    const handle = TaskHandle.create({ taskId: '  abc123 ', initialStatus: 'queued' });

    expect(handle.taskId).toBe('abc123');
    expect(handle.initialStatus).toBe('queued');
    expect(Object.isFrozen(handle)).toBe(true);
    expect(Reflect.set(handle, 'taskId', 'other')).toBe(false);
    expect(handle.taskId).toBe('abc123');
  });

  it('should reject a blank task id', () => {
    expect(() => TaskHandle.create({ taskId: '   ' })).toThrow('Task ID is required');
  });
});

describe('ServiceSpec', () => {
  const output = { stdout: '/tmp/logs/api.log', stderr: '/tmp/logs/api.log' };

  it('should deep-freeze the declaration and copy its inputs', () => {
    const args = ['-m', 'uvicorn'];
    const spec = ServiceSpec.create({ name: 'api', executable: 'python3', args, output });
    args.push('--reload');

    expect(spec.args).toEqual(['-m', 'uvicorn']);
    expect(Object.isFrozen(spec)).toBe(true);
    expect(Object.isFrozen(spec.args)).toBe(true);
    expect(Object.isFrozen(spec.output)).toBe(true);
  });

  it('should describe the command line', () => {
    const spec = ServiceSpec.create({
      name: 'api',
      executable: 'python3',
      args: ['-m', 'uvicorn', 'api.main:app'],
      output,
    });

    expect(ServiceSpec.describe(spec)).toBe('python3 -m uvicorn api.main:app');
  });

  it('should require a name and an executable', () => {
    expect(() => ServiceSpec.create({ name: '', executable: 'python3', output })).toThrow(
      'Service name is required',
    );
    expect(() => ServiceSpec.create({ name: 'api', executable: ' ', output })).toThrow(
      'Executable is required for service api',
    );
  });
});

describe('ResultLocationVO', () => {
  it('should keep the url and expiry', () => {
    const location = ResultLocationVO.create({
      downloadUrl: 'https://downloads.test/abc123.zip',
      expiresIn: 3600,
    });

    expect(location.toJSON()).toEqual({
      downloadUrl: 'https://downloads.test/abc123.zip',
      expiresIn: 3600,
    });
  });

  it('should reject an empty url or a negative expiry', () => {
    expect(() => ResultLocationVO.create({ downloadUrl: ' ', expiresIn: 10 })).toThrow(
      'Download URL cannot be empty',
    );
    expect(() =>
      ResultLocationVO.create({ downloadUrl: 'https://downloads.test/x', expiresIn: -1 }),
    ).toThrow('Expiry must be a non-negative number of seconds');
  });
});
