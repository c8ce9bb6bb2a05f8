import { Reporter } from '../Reporter';
import { RunOutcome } from '../../types';
import { NOW, daysAgo, descriptor, makeTempDir, removeTempDir } from '../../__tests__/fixtures';
import * as fs from 'fs';
import * as path from 'path';

const outcome = (overrides: Partial<RunOutcome>): RunOutcome => ({
  taskId: 'app',
  directory: '/var/log/app',
  simulated: false,
  scanned: 0,
  kept: 0,
  selected: [],
  removed: [],
  failures: [],
  warnings: [],
  bytesSelected: 0,
  bytesRemoved: 0,
  durationMs: 0,
  ...overrides
});

// The file transport opens and writes asynchronously
async function waitForContent(file: string, attempts: number = 100): Promise<string> {
  for (let i = 0; i < attempts; i++) {
    const content = await fs.promises.readFile(file, 'utf8').catch(() => '');
    if (content.includes('\n')) {
      return content;
    }
    await new Promise(resolve => setTimeout(resolve, 20));
  }
  throw new Error(`Nothing was written to ${file}`);
}

describe('Reporter', () => {
  let reporter: Reporter;

  const oldest = descriptor('d.log', daysAgo(40), 40);
  const older = descriptor('c.log', daysAgo(30), 30);

  const applied = outcome({
    scanned: 4,
    kept: 2,
    selected: [
      { file: oldest, reasons: ['maxAge'] },
      { file: older, reasons: ['maxAge', 'maxCount'] }
    ],
    removed: [oldest, older],
    bytesSelected: 70,
    bytesRemoved: 70,
    warnings: [{
      kind: 'vanished',
      path: '/var/log/app/e.log',
      code: 'ENOENT',
      message: 'File disappeared before it could be removed'
    }]
  });

  const failed = outcome({
    taskId: 'db',
    directory: '/var/log/db',
    failures: [{ kind: 'scan', path: '/var/log/db', code: 'ENOENT', message: 'Directory does not exist: /var/log/db' }]
  });

  beforeEach(() => {
    reporter = new Reporter({ silent: true });
  });

  describe('generateReport', () => {
    it('should aggregate task outcomes', () => {
      const finishedAt = new Date(NOW.getTime() + 1500);

      const report = reporter.generateReport([applied, failed], false, NOW, finishedAt);

      expect(report.startedAt).toBe(NOW);
      expect(report.finishedAt).toBe(finishedAt);
      expect(report.durationMs).toBe(1500);
      expect(report.dryRun).toBe(false);
      expect(report.outcomes).toEqual([applied, failed]);
      expect(report.anyFailed).toBe(true);
      expect(report.totals).toEqual({
        tasks: 2,
        failedTasks: 1,
        filesSelected: 2,
        filesRemoved: 2,
        bytesSelected: 70,
        bytesRemoved: 70
      });
    });

    it('should not count warnings as failures', () => {
      const report = reporter.generateReport([applied], false, NOW, NOW);

      expect(report.anyFailed).toBe(false);
      expect(report.totals.failedTasks).toBe(0);
    });
  });

  describe('generateSummary', () => {
    it('should describe an applied run', () => {
      const report = reporter.generateReport([applied, failed], false, NOW, new Date(NOW.getTime() + 1500));

      expect(reporter.generateSummary(report).split('\n')).toEqual([
        '=== logsweep report (APPLY) ===',
        'Started: 2026-03-01T12:00:00.000Z',
        'Duration: 1.50s',
        '',
        'TASKS:',
        '  app [OK]: scanned 4, kept 2, selected 2 (70 B), removed 2 (70 B)',
        '    selected: /var/log/app/d.log [maxAge]',
        '    selected: /var/log/app/c.log [maxAge, maxCount]',
        '  db [FAILED]: scanned 0, kept 0, selected 0 (0 B), removed 0 (0 B)',
        '',
        'FAILURES:',
        '  db: scan: Directory does not exist: /var/log/db [/var/log/db]',
        '',
        'WARNINGS:',
        '  app: vanished: File disappeared before it could be removed [/var/log/app/e.log]',
        '',
        'Files removed: 2',
        'Space freed: 70 B',
        'Successful tasks: 1/2 [50%]',
        'Failed tasks:     1/2 [50%]'
      ]);
    });

    it('should describe a dry-run', () => {
      const planned = descriptor('old.log', daysAgo(60), 2048);
      const simulated = outcome({
        simulated: true,
        scanned: 3,
        kept: 2,
        selected: [{ file: planned, reasons: ['maxAge'] }],
        bytesSelected: 2048
      });

      const report = reporter.generateReport([simulated], true, NOW, NOW);

      expect(reporter.generateSummary(report).split('\n')).toEqual([
        '=== logsweep report (DRY-RUN) ===',
        'Started: 2026-03-01T12:00:00.000Z',
        'Duration: 0.00s',
        '',
        'TASKS:',
        '  app [OK] (dry-run): scanned 3, kept 2, selected 1 (2 KB), removed 0 (0 B)',
        '    would remove: /var/log/app/old.log [maxAge]',
        '',
        'Files that would be removed: 1',
        'Space that would be freed: 2 KB',
        'Successful tasks: 1/1 [100%]',
        'Failed tasks:     0/1 [0%]'
      ]);
    });

    it('should floor success percentages', () => {
      const report = reporter.generateReport([applied, applied, failed], false, NOW, NOW);
      const lines = reporter.generateSummary(report).split('\n');

      expect(lines.slice(-2)).toEqual([
        'Successful tasks: 2/3 [66%]',
        'Failed tasks:     1/3 [33%]'
      ]);
    });
  });

  describe('saveReport', () => {
    let tempDir: string;

    beforeEach(async () => {
      tempDir = await makeTempDir();
    });

    afterEach(async () => {
      await removeTempDir(tempDir);
    });

    it('should write the report as JSON, creating missing directories', async () => {
      const report = reporter.generateReport([failed], false, NOW, NOW);
      const target = path.join(tempDir, 'reports', 'last-run.json');

      const savedTo = await reporter.saveReport(report, target);

      expect(savedTo).toBe(target);
      const saved = JSON.parse(await fs.promises.readFile(target, 'utf8'));
      expect(saved.startedAt).toBe('2026-03-01T12:00:00.000Z');
      expect(saved.anyFailed).toBe(true);
      expect(saved.outcomes[0].failures[0].kind).toBe('scan');
    });

    it('should reject when the report cannot be written', async () => {
      const blocker = path.join(tempDir, 'blocker');
      await fs.promises.writeFile(blocker, 'not a directory');
      const report = reporter.generateReport([failed], false, NOW, NOW);

      await expect(reporter.saveReport(report, path.join(blocker, 'report.json')))
        .rejects.toThrow(/^Failed to save report: /);
    });
  });

  describe('logging', () => {
    let tempDir: string;

    beforeEach(async () => {
      tempDir = await makeTempDir();
    });

    afterEach(async () => {
      await removeTempDir(tempDir);
    });

    it('should log only to the console by default', () => {
      const transports = reporter.getLogger().transports;

      expect(transports).toHaveLength(1);
      expect(transports[0].silent).toBe(true);
    });

    it('should keep writing the log file when the console is silenced', async () => {
      const logFile = path.join(tempDir, 'logs', 'logsweep.log');
      const fileReporter = new Reporter({ level: 'info', file: logFile, silent: true });

      fileReporter.logRunStart(2, false);
      const content = await waitForContent(logFile);
      const silenced = fileReporter.getLogger().transports.map(transport => transport.silent === true);
      fileReporter.getLogger().close();

      const entry = JSON.parse(content.trim().split('\n')[0]);
      expect(entry.level).toBe('info');
      expect(entry.message).toBe('Starting cleanup for 2 task(s)');
      expect(entry.taskCount).toBe(2);
      expect(silenced).toEqual([true, false]);
    });
  });
});
