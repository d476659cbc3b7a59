import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import * as path from 'path';
import { HarnessExitCode, HarnessRunnerService } from '../../src/harness/harness-runner.service';
import { RunIntegrationUseCase } from '../../src/application/use-cases/run-integration.use-case';
import { WaitUntilHealthyUseCase } from '../../src/application/use-cases/wait-until-healthy.use-case';
import { SubmitTaskUseCase } from '../../src/application/use-cases/submit-task.use-case';
import { PollTaskStatusUseCase } from '../../src/application/use-cases/poll-task-status.use-case';
import { ResolveResultUseCase } from '../../src/application/use-cases/resolve-result.use-case';
import { ProcessSupervisorService } from '../../src/supervisor/process-supervisor.service';
import {
  InMemoryProcessLauncherAdapter,
  InMemoryReporterAdapter,
  InMemoryTranslationApiAdapter,
} from '../in-memory-adapters';
import {
  asLogger,
  createConfigService,
  createMockLogger,
  createTestConfig,
  MockLogger,
} from '../unit/helpers/mock-factories';

describe('Integration harness run', () => {
  let workDir: string;
  let inputFile: string;
  let translationApi: InMemoryTranslationApiAdapter;
  let launcher: InMemoryProcessLauncherAdapter;
  let reporter: InMemoryReporterAdapter;
  let runnerLogger: MockLogger;

  const createRunner = (overrides: Record<string, string> = {}) => {
    const configService = createConfigService(
      createTestConfig(
        {
          INPUT_FILE: inputFile,
          HEALTH_MAX_ATTEMPTS: '3',
          HEALTH_INTERVAL_MS: '0',
          POLL_MAX_ITERATIONS: '10',
          POLL_INTERVAL_MS: '0',
          ...overrides,
        },
        workDir,
      ),
    );
    const logger = () => asLogger(createMockLogger());
    const supervisor = new ProcessSupervisorService(launcher, configService, logger());

    const runIntegration = new RunIntegrationUseCase(
      supervisor,
      new WaitUntilHealthyUseCase(translationApi, logger()),
      new SubmitTaskUseCase(translationApi, reporter, logger()),
      new PollTaskStatusUseCase(translationApi, reporter, logger()),
      new ResolveResultUseCase(translationApi, reporter, logger()),
      reporter,
      logger(),
    );

    return new HarnessRunnerService(runIntegration, configService, asLogger(runnerLogger));
  };

  beforeEach(async () => {
    workDir = await mkdtemp(path.join(tmpdir(), 'harness-run-'));
    inputFile = path.join(workDir, 'sample.txt');
    await writeFile(inputFile, 'The quick brown fox.\n');

    translationApi = new InMemoryTranslationApiAdapter();
    launcher = new InMemoryProcessLauncherAdapter();
    reporter = new InMemoryReporterAdapter();
    runnerLogger = createMockLogger();
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  it('should report a failed task, skip the result and tear everything down', async () => {
    translationApi.setTaskId('abc123');
    translationApi.setHealthScript([new Error('connect ECONNREFUSED'), { statusCode: 200, status: 'ok' }]);
    translationApi.setStatusScript([
      { status: 'queued' },
      { status: 'processing', progress: 0.25, processedFiles: 1, totalFiles: 4 },
      { status: 'processing', progress: 0.5, processedFiles: 2, totalFiles: 4 },
      new Error('headers timeout'),
      { status: 'failed', progress: 0.5, processedFiles: 2, totalFiles: 4, errorMessage: 'corrupt archive' },
    ]);

    const exitCode = await createRunner().run();

    expect(exitCode).toBe(HarnessExitCode.TASK_FAILED);
    expect(launcher.getLaunched()).toEqual([
      'translation-api',
      'coordinator-worker',
      'file-translation-worker-1',
    ]);
    expect(translationApi.countCalls('GET /health')).toBe(2);
    expect(translationApi.getSubmissions()).toEqual([
      { filePath: inputFile, targetLanguage: 'zh-CN', translateStyle: 'auto' },
    ]);
    expect(translationApi.countCalls('GET /v1/tasks/abc123')).toBe(5);
    expect(translationApi.countCalls('GET /v1/tasks/abc123/result-url')).toBe(0);
    expect(reporter.getLines()).toEqual([
      'TASK_ID=abc123',
      'INITIAL_STATUS=queued',
      'POLL 1: status=queued, progress=0.00, processed=?/?',
      'POLL 2: status=processing, progress=0.25, processed=1/4',
      'POLL 3: status=processing, progress=0.50, processed=2/4',
      'POLL 5: status=failed, progress=0.50, processed=2/4',
      'FINAL_STATUS=failed',
      'FINAL_PROGRESS=0.50',
      'FINAL_ERROR=corrupt archive',
      'INTEGRATION_RESULT=FAILED',
    ]);
    expect(launcher.getTerminated()).toEqual([
      'file-translation-worker-1',
      'coordinator-worker',
      'translation-api',
    ]);
    expect(launcher.getRunning()).toEqual([]);
  });

  it('should resolve the download location of a completed task and pass', async () => {
    translationApi.setTaskId('abc123');
    translationApi.setResultLocation('https://downloads.test/abc123.zip', 600);
    translationApi.setStatusScript([
      'not-found',
      { status: 'processing', progress: 0.5, processedFiles: 1, totalFiles: 2 },
      { status: 'completed', progress: 1, processedFiles: 2, totalFiles: 2 },
    ]);

    const exitCode = await createRunner({ FILE_WORKER_COUNT: '2' }).run();

    expect(exitCode).toBe(HarnessExitCode.PASSED);
    expect(reporter.getLines()).toEqual([
      'TASK_ID=abc123',
      'INITIAL_STATUS=queued',
      'POLL 1: task not found yet',
      'POLL 2: status=processing, progress=0.50, processed=1/2',
      'POLL 3: status=completed, progress=1.00, processed=2/2',
      'FINAL_STATUS=completed',
      'FINAL_PROGRESS=1.00',
      'FINAL_ERROR=',
      'RESULT_URL=https://downloads.test/abc123.zip',
      'RESULT_EXPIRES_IN=600',
      'INTEGRATION_RESULT=PASSED',
    ]);
    expect(launcher.getTerminated()).toEqual([
      'file-translation-worker-2',
      'file-translation-worker-1',
      'coordinator-worker',
      'translation-api',
    ]);
  });

  it('should exit with 1 and name the crashed service when health never succeeds', async () => {
    translationApi.setHealthScript([new Error('connect ECONNREFUSED')]);
    const runner = createRunner();

    const probe = translationApi.probeHealth.bind(translationApi);
    translationApi.probeHealth = async () => {
      launcher.getHandle('coordinator-worker')?.crash(1);
      return probe();
    };

    const exitCode = await runner.run();

    expect(exitCode).toBe(HarnessExitCode.ERROR);
    expect(translationApi.countCalls('GET /health')).toBe(3);
    expect(translationApi.getSubmissions()).toEqual([]);
    expect(runnerLogger.error).toHaveBeenCalledWith(
      {
        code: 'HEALTH_TIMEOUT',
        error:
          'Service did not become healthy after 3 attempts (last: connect ECONNREFUSED); ' +
          'services already exited: coordinator-worker',
      },
      'Integration run failed',
    );
    expect(reporter.getLines()).toEqual(['INTEGRATION_RESULT=FAILED']);
    expect(launcher.getRunning()).toEqual([]);
  });

  it('should stop the services it started when a later launch fails', async () => {
    launcher.failLaunchOf('coordinator-worker');

    const exitCode = await createRunner().run();

    expect(exitCode).toBe(HarnessExitCode.ERROR);
    expect(launcher.getLaunched()).toEqual(['translation-api']);
    expect(launcher.getTerminated()).toEqual(['translation-api']);
    expect(translationApi.getCalls()).toEqual([]);
    expect(runnerLogger.error).toHaveBeenCalledWith(
      {
        code: 'LAUNCH_FAILED',
        error: 'Failed to launch service coordinator-worker: spawn python3 ENOENT',
      },
      'Integration run failed',
    );
  });

  it('should start nothing when the input file is missing', async () => {
    inputFile = path.join(workDir, 'missing.txt');

    const exitCode = await createRunner().run();

    expect(exitCode).toBe(HarnessExitCode.ERROR);
    expect(launcher.getLaunched()).toEqual([]);
    expect(reporter.getLines()).toEqual(['INTEGRATION_RESULT=FAILED']);
  });

  it('should give up after the polling budget and still tear down', async () => {
    translationApi.setStatusScript([{ status: 'processing', progress: 0.1 }]);

    const exitCode = await createRunner({ POLL_MAX_ITERATIONS: '3' }).run();

    expect(exitCode).toBe(HarnessExitCode.ERROR);
    expect(translationApi.countCalls('GET /v1/tasks/task-1')).toBe(3);
    expect(runnerLogger.error).toHaveBeenCalledWith(
      {
        code: 'POLL_TIMEOUT',
        error: 'Task task-1 did not reach a terminal status after 3 polls. Last status: processing',
      },
      'Integration run failed',
    );
    expect(launcher.getRunning()).toEqual([]);
  });
});
