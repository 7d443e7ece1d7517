import { PruneManager } from '../src/clients/PruneManager';
import { RetentionSelector } from '../src/clients/RetentionSelector';
import { PruneReporter } from '../src/clients/PruneReporter';
import { TarsnapClient } from '../src/interfaces/TarsnapClient';
import { PruneConfig } from '../src/interfaces/PruneConfig';
import { Logger, LogLevel } from '../src/interfaces/Logger';
import { InvalidKeepSpecError } from '../src/retention/KeepSpecParser';
import { InvalidListingLineError } from '../src/listing/ListingParser';
import { TarsnapCommandError } from '../src/clients/TarsnapClient';

const LISTING =
  'web-20200103\t2020-01-03 02:00:00\n' +
  'web-20200102\t2020-01-02 02:00:00\n' +
  'web-20200101\t2020-01-01 02:00:00\n' +
  'db-20200101\t2020-01-01 03:00:00\n';

describe('PruneManager', () => {
  let mockTarsnapClient: jest.Mocked<TarsnapClient>;
  let mockLogger: jest.Mocked<Logger>;
  let lines: string[];
  let config: PruneConfig;

  beforeEach(() => {
    jest.clearAllMocks();

    mockTarsnapClient = {
      listArchives: jest.fn().mockResolvedValue(LISTING),
      deleteArchives: jest.fn().mockResolvedValue(undefined),
    };

    mockLogger = {
      info: jest.fn(),
      warn: jest.fn(),
      error: jest.fn(),
      debug: jest.fn(),
      logPruneStart: jest.fn(),
      logListingParsed: jest.fn(),
      logFamilyDecision: jest.fn(),
      logPruneComplete: jest.fn(),
      logCommandError: jest.fn(),
      logConfigurationStart: jest.fn(),
    };

    lines = [];

    config = {
      keepSpec: '1d',
      dryRun: false,
      tarsnapPath: 'tarsnap',
      commandTimeoutMs: 60_000,
      logLevel: LogLevel.WARN,
    };
  });

  const createManager = () =>
    new PruneManager(
      mockTarsnapClient,
      new RetentionSelector(),
      new PruneReporter(line => lines.push(line)),
      mockLogger,
      config
    );

  it('should report and delete archives not kept', async () => {
    const result = await createManager().executePrune();

    expect(result).toMatchObject({
      toDelete: ['web-20200102', 'web-20200101'],
      remaining: ['db-20200101', 'web-20200103'],
      dryRun: false,
      deleted: true,
      archiveCount: 4,
      familyCount: 2,
    });
    expect(mockTarsnapClient.deleteArchives).toHaveBeenCalledWith([
      'web-20200102',
      'web-20200101',
    ]);
    expect(lines).toEqual([
      'Will delete the following 2 archives:',
      '  web-20200101',
      '  web-20200102',
      'Leaving the following 2 remaining archives:',
      '  db-20200101',
      '  web-20200103',
      'Deleting 2 archives...',
    ]);
  });

  it('should never delete on a dry run', async () => {
    config.dryRun = true;

    const result = await createManager().executePrune();

    expect(result.deleted).toBe(false);
    expect(mockTarsnapClient.deleteArchives).not.toHaveBeenCalled();
    expect(lines[0]).toBe('Would delete the following 2 archives:');
    expect(lines).not.toContain('Deleting 2 archives...');
  });

  it('should say so when nothing needs deleting', async () => {
    config.keepSpec = '3d';

    const result = await createManager().executePrune();

    expect(result.toDelete).toEqual([]);
    expect(mockTarsnapClient.deleteArchives).not.toHaveBeenCalled();
    expect(lines).toEqual([
      'Will delete the following 0 archives:',
      'Leaving the following 4 remaining archives:',
      '  db-20200101',
      '  web-20200101',
      '  web-20200102',
      '  web-20200103',
      'Nothing to delete.',
    ]);
  });

  it('should reject a bad keep spec before listing archives', async () => {
    config.keepSpec = '2x';

    await expect(createManager().executePrune()).rejects.toThrow(InvalidKeepSpecError);
    expect(mockTarsnapClient.listArchives).not.toHaveBeenCalled();
  });

  it('should abort on a malformed listing without deleting', async () => {
    mockTarsnapClient.listArchives.mockResolvedValue('web-1\tyesterday\n');

    await expect(createManager().executePrune()).rejects.toThrow(InvalidListingLineError);
    expect(mockTarsnapClient.deleteArchives).not.toHaveBeenCalled();
    expect(lines).toEqual([]);
  });

  it('should propagate a failing delete command', async () => {
    mockTarsnapClient.deleteArchives.mockRejectedValue(
      new TarsnapCommandError("Command 'tarsnap -d' failed with exit status 1", 'tarsnap -d', 1)
    );

    await expect(createManager().executePrune()).rejects.toThrow(
      "Command 'tarsnap -d' failed with exit status 1"
    );
  });

  it('should log the run and every family decision', async () => {
    await createManager().executePrune();

    expect(mockLogger.logPruneStart).toHaveBeenCalledWith('1d', false);
    expect(mockLogger.logListingParsed).toHaveBeenCalledWith(4, 2);
    expect(mockLogger.logFamilyDecision).toHaveBeenCalledWith('web', 3, 2);
    expect(mockLogger.logFamilyDecision).toHaveBeenCalledWith('db', 1, 0);
    expect(mockLogger.logPruneComplete).toHaveBeenCalledWith(2, 2, false, expect.any(Number));
  });

  it('should handle an empty listing', async () => {
    mockTarsnapClient.listArchives.mockResolvedValue('');

    const result = await createManager().executePrune();

    expect(result).toMatchObject({ toDelete: [], remaining: [], archiveCount: 0, familyCount: 0 });
    expect(lines).toEqual([
      'Will delete the following 0 archives:',
      'Leaving the following 0 remaining archives:',
      'Nothing to delete.',
    ]);
  });
});
