import assert from 'assert';
import sinon from 'sinon';
import logger from '@version-sync/logger';
import {MemoryVersionControl} from '@version-sync/test-utils';
import {
  detectDrift,
  formatVersion,
  parseVersion,
  type ConfigEntry,
  type DriftReport,
  type DriftRow,
} from '../src';

const refs = {baseline: 'base', head: 'head'};

function entry(
  targetFile: string,
  version: string,
  search: string | null = null,
): ConfigEntry {
  return {
    targetFile,
    search,
    replace: null,
    currentVersion: parseVersion(version),
  };
}

function summarize(row: DriftRow) {
  return {
    file: row.file,
    status: row.status,
    inSync: row.inSync,
    baselineVersion:
      row.baselineVersion != null ? formatVersion(row.baselineVersion) : null,
    headVersion: row.headVersion != null ? formatVersion(row.headVersion) : null,
  };
}

function summarizeReport(report: DriftReport) {
  return {ok: report.ok, rows: report.rows.map(summarize)};
}

describe('detectDrift', () => {
  let sandbox: sinon.SinonSandbox;
  let warn: sinon.SinonStub;
  let error: sinon.SinonStub;

  beforeEach(() => {
    sandbox = sinon.createSandbox();
    sandbox.stub(logger, 'verbose');
    warn = sandbox.stub(logger, 'warn');
    error = sandbox.stub(logger, 'error');
  });

  afterEach(() => {
    sandbox.restore();
  });

  it('is in sync when the file did not change', async () => {
    let vcs = new MemoryVersionControl({
      revisions: {
        base: {VERSION: '1.2.3\n'},
        head: {VERSION: '1.2.3\n'},
      },
    });

    let report = await detectDrift([entry('VERSION', '1.2.3')], refs, {vcs});

    assert.deepEqual(summarizeReport(report), {
      ok: true,
      rows: [
        {
          file: 'VERSION',
          status: 'unchanged',
          inSync: true,
          baselineVersion: '1.2.3',
          headVersion: '1.2.3',
        },
      ],
    });
  });

  it('is in sync when the version was bumped', async () => {
    let vcs = new MemoryVersionControl({
      revisions: {
        base: {VERSION: '1.2.3\n'},
        head: {VERSION: '1.2.4\n'},
      },
    });

    let report = await detectDrift([entry('VERSION', '1.2.4')], refs, {vcs});

    assert.equal(report.ok, true);
    assert.deepEqual(summarize(report.rows[0]), {
      file: 'VERSION',
      status: 'bumped',
      inSync: true,
      baselineVersion: '1.2.3',
      headVersion: '1.2.4',
    });
  });

  it('flags a file that changed without a version bump', async () => {
    let vcs = new MemoryVersionControl({
      revisions: {
        base: {'setup.cfg': 'version = 1.2.3\nname = a\n'},
        head: {'setup.cfg': 'version = 1.2.3\nname = b\n'},
      },
    });

    let report = await detectDrift([entry('setup.cfg', '1.2.3')], refs, {
      vcs,
    });

    assert.equal(report.ok, false);
    assert.deepEqual(summarize(report.rows[0]), {
      file: 'setup.cfg',
      status: 'not-bumped',
      inSync: false,
      baselineVersion: '1.2.3',
      headVersion: '1.2.3',
    });
    assert.equal(warn.callCount, 1);
    assert.deepEqual(warn.firstCall.args[0], {
      message:
        'setup.cfg: not-bumped (1.2.3 -> 1.2.3), version needs to be bumped',
      origin: '@version-sync/core',
      filePath: 'setup.cfg',
    });
  });

  it('treats a file missing at the baseline as new', async () => {
    let vcs = new MemoryVersionControl({
      revisions: {
        base: {},
        head: {'chart.yaml': 'version: 0.1.0\n'},
      },
    });

    let report = await detectDrift([entry('chart.yaml', '0.1.0')], refs, {
      vcs,
    });

    assert.deepEqual(summarizeReport(report), {
      ok: true,
      rows: [
        {
          file: 'chart.yaml',
          status: 'new-file',
          inSync: true,
          baselineVersion: null,
          headVersion: '0.1.0',
        },
      ],
    });
  });

  it('flags a head version that differs from the declared one', async () => {
    let vcs = new MemoryVersionControl({
      revisions: {
        base: {'README.md': 'Install 1.2.3\n'},
        head: {'README.md': 'Install 1.2.3\n'},
      },
    });

    let report = await detectDrift([entry('README.md', '1.2.4')], refs, {
      vcs,
    });

    assert.deepEqual(summarize(report.rows[0]), {
      file: 'README.md',
      status: 'mismatch',
      inSync: false,
      baselineVersion: '1.2.3',
      headVersion: '1.2.3',
    });
  });

  it('flags a version that went down', async () => {
    let vcs = new MemoryVersionControl({
      revisions: {
        base: {VERSION: '1.3.0'},
        head: {VERSION: '1.2.0'},
      },
    });

    let report = await detectDrift([entry('VERSION', '1.2.0')], refs, {vcs});

    assert.equal(report.rows[0].status, 'regressed');
    assert.equal(report.ok, false);
  });

  it('finds the previous version through the search template', async () => {
    let vcs = new MemoryVersionControl({
      revisions: {
        base: {'pyproject.toml': 'deps = "2.0.0"\nversion = "1.0.0"\n'},
        head: {'pyproject.toml': 'deps = "2.0.0"\nversion = "1.1.0"\n'},
      },
    });

    let report = await detectDrift(
      [entry('pyproject.toml', '1.1.0', 'version = "{current_version}"')],
      refs,
      {vcs},
    );

    assert.deepEqual(summarize(report.rows[0]), {
      file: 'pyproject.toml',
      status: 'bumped',
      inSync: true,
      baselineVersion: '1.0.0',
      headVersion: '1.1.0',
    });
  });

  it('finds the previous version when the template repeats it', async () => {
    let vcs = new MemoryVersionControl({
      revisions: {
        base: {Dockerfile: 'FROM node:20\nLABEL v=1.2.3 tag=app:1.2.3\n'},
        head: {Dockerfile: 'FROM node:20\nLABEL v=1.2.4 tag=app:1.2.4\n'},
      },
    });

    let report = await detectDrift(
      [
        entry(
          'Dockerfile',
          '1.2.4',
          'LABEL v={current_version} tag=app:{current_version}',
        ),
      ],
      refs,
      {vcs},
    );

    assert.deepEqual(summarize(report.rows[0]), {
      file: 'Dockerfile',
      status: 'bumped',
      inSync: true,
      baselineVersion: '1.2.3',
      headVersion: '1.2.4',
    });
  });

  it('records where each version was found, in bytes', async () => {
    let vcs = new MemoryVersionControl({
      revisions: {
        base: {VERSION: 'é 1.2.3\n'},
        head: {VERSION: 'é 1.2.4\n'},
      },
    });

    let report = await detectDrift([entry('VERSION', '1.2.4')], refs, {vcs});

    assert.deepEqual(
      report.rows[0].occurrences.map((o) => ({
        file: o.file,
        revision: o.revision,
        rawMatch: o.rawMatch,
        version: formatVersion(o.parsed),
        span: o.span,
      })),
      [
        {
          file: 'VERSION',
          revision: 'base',
          rawMatch: '1.2.3',
          version: '1.2.3',
          span: {start: 3, end: 8},
        },
        {
          file: 'VERSION',
          revision: 'head',
          rawMatch: '1.2.4',
          version: '1.2.4',
          span: {start: 3, end: 8},
        },
      ],
    );
  });

  it('has no occurrences on error rows', async () => {
    let vcs = new MemoryVersionControl({revisions: {base: {}, head: {}}});

    let report = await detectDrift([entry('VERSION', '1.0.0')], refs, {vcs});

    assert.deepEqual(report.rows[0].occurrences, []);
  });

  it('substitutes config variables into search templates', async () => {
    let vcs = new MemoryVersionControl({
      revisions: {
        base: {'values.yaml': 'tag: web-1.0.0\n'},
        head: {'values.yaml': 'tag: web-1.0.1\n'},
      },
    });

    let report = await detectDrift(
      [entry('values.yaml', '1.0.1', 'tag: {app}-{current_version}')],
      refs,
      {vcs, variables: {app: 'web'}},
    );

    assert.equal(report.rows[0].status, 'bumped');
  });

  it('keeps going after an entry fails', async () => {
    let vcs = new MemoryVersionControl({
      revisions: {
        base: {VERSION: '1.0.0', 'notes.txt': 'no version'},
        head: {VERSION: '1.0.1', 'notes.txt': 'still no version'},
      },
    });

    let report = await detectDrift(
      [
        entry('missing.txt', '1.0.1'),
        entry('notes.txt', '1.0.1'),
        entry('VERSION', '1.0.1'),
      ],
      refs,
      {vcs},
    );

    assert.equal(report.ok, false);
    assert.deepEqual(
      report.rows.map((row) => [row.file, row.status, row.error?.code]),
      [
        ['missing.txt', 'error', 'NOT_FOUND'],
        ['notes.txt', 'error', 'PARSE_ERROR'],
        ['VERSION', 'bumped', undefined],
      ],
    );
    assert.equal(error.callCount, 2);
  });

  it('reports collaborator failures as IO errors', async () => {
    let vcs = new MemoryVersionControl({revisions: {base: {VERSION: '1.0.0'}}});

    let report = await detectDrift(
      [entry('VERSION', '1.0.0')],
      {baseline: 'base', head: 'unknown'},
      {vcs},
    );

    assert.equal(report.rows[0].status, 'error');
    assert.equal(report.rows[0].error?.code, 'IO_ERROR');
  });

  describe('repository policy', () => {
    it('accepts equal versions only when nothing changed', async () => {
      let vcs = new MemoryVersionControl({
        revisions: {
          base: {VERSION: '1.0.0', 'src/app.ts': 'a'},
          head: {VERSION: '1.0.0', 'src/app.ts': 'b'},
          same: {VERSION: '1.0.0', 'src/app.ts': 'a'},
        },
      });
      let diff = sandbox.spy(vcs, 'diffNameOnly');
      let entries = [entry('VERSION', '1.0.0'), entry('VERSION', '1.0.0')];

      let changed = await detectDrift(entries, refs, {
        vcs,
        policy: 'repository',
      });
      assert.deepEqual(
        changed.rows.map((row) => row.status),
        ['not-bumped', 'not-bumped'],
      );
      assert.equal(diff.callCount, 1);

      let unchanged = await detectDrift(
        entries,
        {baseline: 'base', head: 'same'},
        {vcs, policy: 'repository'},
      );
      assert.equal(unchanged.ok, true);
      assert.equal(unchanged.rows[0].status, 'unchanged');
    });

    it('only looks for changes inside the scope', async () => {
      let vcs = new MemoryVersionControl({
        revisions: {
          base: {'pkg/VERSION': '1.0.0', 'other/app.ts': 'a'},
          head: {'pkg/VERSION': '1.0.0', 'other/app.ts': 'b'},
        },
      });
      let entries = [entry('pkg/VERSION', '1.0.0')];

      let inside = await detectDrift(entries, refs, {
        vcs,
        policy: 'repository',
        scope: 'pkg',
      });
      assert.equal(inside.rows[0].status, 'unchanged');

      let outside = await detectDrift(entries, refs, {
        vcs,
        policy: 'repository',
        scope: 'other/',
      });
      assert.equal(outside.rows[0].status, 'not-bumped');
    });

    it('does not diff under the content policy', async () => {
      let vcs = new MemoryVersionControl({
        revisions: {
          base: {VERSION: '1.0.0', 'src/app.ts': 'a'},
          head: {VERSION: '1.0.0', 'src/app.ts': 'b'},
        },
      });
      let diff = sandbox.spy(vcs, 'diffNameOnly');

      let report = await detectDrift([entry('VERSION', '1.0.0')], refs, {vcs});

      assert.equal(report.rows[0].status, 'unchanged');
      assert.equal(diff.callCount, 0);
    });
  });

  describe('properties', () => {
    let vcs: MemoryVersionControl;
    let entries: Array<ConfigEntry>;

    beforeEach(() => {
      vcs = new MemoryVersionControl({
        revisions: {
          base: {a: '1.0.0', b: '1.0.0 x', c: '0.9.0', d: '1.0.0'},
          head: {a: '1.0.0', b: '1.0.0 y', c: '1.0.0', d: '0.0.1'},
        },
      });
      entries = ['a', 'b', 'c', 'd', 'e'].map((file) => entry(file, '1.0.0'));
    });

    it('does not depend on entry order', async () => {
      let forward = await detectDrift(entries, refs, {vcs});
      let backward = await detectDrift([...entries].reverse(), refs, {vcs});

      let byFile = (report: DriftReport) =>
        report.rows.map(summarize).sort((x, y) => x.file.localeCompare(y.file));

      assert.deepEqual(byFile(forward), byFile(backward));
      assert.deepEqual(
        backward.rows.map((row) => row.file),
        ['e', 'd', 'c', 'b', 'a'],
      );
    });

    it('gives the same report when run twice', async () => {
      let first = await detectDrift(entries, refs, {vcs, concurrency: 1});
      let second = await detectDrift(entries, refs, {vcs, concurrency: 3});

      assert.deepEqual(summarizeReport(first), summarizeReport(second));
      assert.deepEqual(
        first.rows.map((row) => row.status),
        ['unchanged', 'not-bumped', 'bumped', 'mismatch', 'error'],
      );
    });
  });
});
