import { Readable, Writable } from 'stream';
import { runTailWorkflow, TailDependencies } from './tail-workflow';
import { ClusterClient, LogStreamRequest, PodSummary, TailConfig } from './types';
import { LogAggregator } from './logs/log-aggregator';

jest.mock('./logger', () => ({
  logger: {
    trace: jest.fn(),
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

const baseConfig: TailConfig = {
  image: 'registry.local/web:2.3.0',
  retryLimit: 2,
  retryDelayMs: 0,
  readyTimeoutMs: 1000,
  logLevel: 'info',
  muted: false,
};

const createLogger = () => ({
  info: jest.fn(),
  debug: jest.fn(),
});

function createSink() {
  const lines: string[] = [];
  const output = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      lines.push(chunk.toString('utf-8'));
      callback();
    },
  });
  return { output, lines };
}

function createDependencies(lines: string[]) {
  const pods: PodSummary[] = [
    {
      namespace: 'prod',
      name: 'web-7d9f',
      phase: 'Running',
      containers: [{ name: 'app', image: 'registry.local/web:2.3.0' }],
    },
  ];
  const client = {
    listPods: jest.fn<Promise<PodSummary[]>, []>().mockResolvedValue(pods),
    readPod: jest.fn<Promise<PodSummary>, [string, string]>(),
    openLogStream: jest
      .fn<Promise<Readable>, [LogStreamRequest]>()
      .mockImplementation(async () => Readable.from(lines)),
  } satisfies ClusterClient;
  const dependencies: TailDependencies = {
    createClusterClient: jest.fn().mockReturnValue(client),
    waitForPodReady: jest.fn().mockResolvedValue(undefined),
  };
  return { client, dependencies };
}

describe('runTailWorkflow', () => {
  it('streams the matching container to the output', async () => {
    const { output, lines } = createSink();
    const { client, dependencies } = createDependencies(['ready\n']);
    const logger = createLogger();

    await runTailWorkflow(baseConfig, dependencies, { logger, output });

    expect(dependencies.createClusterClient).toHaveBeenCalledWith(baseConfig);
    expect(dependencies.waitForPodReady).toHaveBeenCalledWith(client, 'prod', 'web-7d9f', undefined);
    expect(lines).toEqual(['[web-7d9f app] ready\n']);
    expect(logger.info).not.toHaveBeenCalled();
  });

  it('starts muted when configured and exposes the aggregator', async () => {
    const { output, lines } = createSink();
    const { dependencies } = createDependencies(['hidden\n']);
    const logger = createLogger();
    const created: LogAggregator[] = [];

    await runTailWorkflow({ ...baseConfig, muted: true }, dependencies, {
      logger,
      output,
      onAggregatorCreated: aggregator => created.push(aggregator),
    });

    expect(lines).toEqual([]);
    expect(logger.info).toHaveBeenCalledWith('Output starts muted');
    expect(created).toHaveLength(1);
    expect(created[0].isMuted()).toBe(true);
    expect(created[0].retryLimit).toBe(2);
    expect(created[0].retryDelayMs).toBe(0);
  });

  it('lets the caller unmute before streaming begins', async () => {
    const { output, lines } = createSink();
    const { dependencies } = createDependencies(['visible\n']);

    await runTailWorkflow({ ...baseConfig, muted: true }, dependencies, {
      logger: createLogger(),
      output,
      onAggregatorCreated: aggregator => aggregator.unmute(),
    });

    expect(lines).toEqual(['[web-7d9f app] visible\n']);
  });

  it('passes the abort signal through to the aggregator', async () => {
    const { output } = createSink();
    const { client, dependencies } = createDependencies(['never\n']);
    const controller = new AbortController();
    controller.abort();

    await runTailWorkflow(baseConfig, dependencies, {
      logger: createLogger(),
      output,
      signal: controller.signal,
    });

    expect(client.listPods).not.toHaveBeenCalled();
  });
});
