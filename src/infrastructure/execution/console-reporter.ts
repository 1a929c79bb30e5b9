import { bold, green, red, yellow } from '@shared/lib/ansi.js';

export type OutputFormat = 'pretty' | 'terse' | 'json';

export interface OutputSink {
  write(chunk: string): void;
}

export type TestEvent =
  | { name: string; kind: 'passed'; durationMs: number }
  | { name: string; kind: 'failed'; durationMs: number; message: string; details?: string }
  | { name: string; kind: 'ignored'; reason?: string };

export interface RunSummary {
  passed: number;
  failed: number;
  ignored: number;
  filteredOut: number;
  durationMs: number;
  failures: Array<Extract<TestEvent, { kind: 'failed' }>>;
}

/** Characters per line in terse output before the progress counter. */
const TERSE_LINE_WIDTH = 88;

const seconds = (ms: number): string => (ms / 1000).toFixed(2);

/**
 * Writes run progress in one of three formats, modelled on the standard
 * console test harness output so existing tooling can parse it.
 */
export class ConsoleReporter {
  private column = 0;
  private total = 0;
  private done = 0;

  constructor(
    private readonly format: OutputFormat,
    private readonly out: OutputSink,
  ) {}

  list(names: readonly string[]): void {
    for (const name of names) {
      if (this.format === 'json') {
        this.json({ type: 'test', event: 'discovered', name });
      } else {
        this.out.write(`${name}: test\n`);
      }
    }
    if (this.format === 'pretty') {
      this.out.write(`\n${names.length} tests, 0 benchmarks\n`);
    }
  }

  plan(count: number): void {
    this.total = count;
    if (this.format === 'json') {
      this.json({ type: 'suite', event: 'started', test_count: count });
      return;
    }
    this.out.write(`\nrunning ${count} ${count === 1 ? 'test' : 'tests'}\n`);
  }

  result(event: TestEvent): void {
    this.done++;
    switch (this.format) {
      case 'json':
        this.jsonResult(event);
        return;
      case 'pretty':
        this.out.write(`test ${event.name} ... ${this.prettyStatus(event)}\n`);
        return;
      case 'terse':
        this.terseResult(event);
        return;
    }
  }

  summary(summary: RunSummary): void {
    const ok = summary.failed === 0;

    if (this.format === 'json') {
      this.json({
        type: 'suite',
        event: ok ? 'ok' : 'failed',
        passed: summary.passed,
        failed: summary.failed,
        ignored: summary.ignored,
        measured: 0,
        filtered_out: summary.filteredOut,
        exec_time: Number(seconds(summary.durationMs)),
      });
      return;
    }

    if (this.format === 'terse' && this.column > 0) {
      this.out.write('\n');
      this.column = 0;
    }

    if (!ok) {
      this.out.write('\nfailures:\n');
      for (const failure of summary.failures) {
        this.out.write(`\n---- ${failure.name} stdout ----\n`);
        this.out.write(`${failure.details ?? failure.message}\n`);
      }
      this.out.write('\nfailures:\n');
      for (const failure of summary.failures) {
        this.out.write(`    ${failure.name}\n`);
      }
    }

    const status = ok ? green('ok') : red('FAILED');
    this.out.write(
      `\ntest result: ${status}. ${summary.passed} passed; ${summary.failed} failed; ` +
        `${summary.ignored} ignored; 0 measured; ${summary.filteredOut} filtered out; ` +
        `finished in ${seconds(summary.durationMs)}s\n\n`,
    );
  }

  private prettyStatus(event: TestEvent): string {
    switch (event.kind) {
      case 'passed': return green('ok');
      case 'failed': return red('FAILED');
      case 'ignored': return event.reason ? `${yellow('ignored')}, ${event.reason}` : yellow('ignored');
    }
  }

  private terseResult(event: TestEvent): void {
    const mark = event.kind === 'passed' ? '.' : event.kind === 'failed' ? red('F') : yellow('i');
    this.out.write(mark);
    this.column++;
    if (this.column === TERSE_LINE_WIDTH) {
      this.out.write(` ${bold(`${this.done}/${this.total}`)}\n`);
      this.column = 0;
    }
  }

  private jsonResult(event: TestEvent): void {
    switch (event.kind) {
      case 'passed':
        this.json({ type: 'test', event: 'ok', name: event.name, exec_time: Number(seconds(event.durationMs)) });
        return;
      case 'failed':
        this.json({
          type: 'test',
          event: 'failed',
          name: event.name,
          exec_time: Number(seconds(event.durationMs)),
          stdout: event.details ?? event.message,
        });
        return;
      case 'ignored':
        this.json({ type: 'test', event: 'ignored', name: event.name, ...(event.reason ? { message: event.reason } : {}) });
        return;
    }
  }

  private json(value: Record<string, unknown>): void {
    this.out.write(JSON.stringify(value) + '\n');
  }
}
