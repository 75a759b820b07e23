import assert from 'assert';
import {
  ConfigError,
  GENERIC_VERSION_PATTERN,
  ParseError,
  VersionParser,
  compareVersions,
  formatVersion,
  parseVersion,
  versionsEqual,
} from '../src';

describe('VersionParser', () => {
  describe('parse', () => {
    it('parses numeric components', () => {
      let version = parseVersion('1.2.3');
      assert.deepEqual(version.components, [1, 2, 3]);
      assert.deepEqual(version.text, ['1', '2', '3']);
      assert.equal(version.label, null);
    });

    it('keeps the label verbatim', () => {
      assert.equal(parseVersion('1.2.3-rc.1').label, '-rc.1');
      assert.equal(parseVersion('1.2.3+build.7').label, '+build.7');
    });

    it('keeps leading zeros in the text but compares numerically', () => {
      let padded = parseVersion('1.02.3');
      assert.deepEqual(padded.components, [1, 2, 3]);
      assert.equal(formatVersion(padded), '1.02.3');
      assert(versionsEqual(padded, parseVersion('1.2.3')));
    });

    it('freezes parsed versions', () => {
      let version = parseVersion('1.2.3');
      assert(Object.isFrozen(version));
      assert(Object.isFrozen(version.components));
      assert(Object.isFrozen(version.text));
    });

    it('rejects input that does not match the whole pattern', () => {
      for (let raw of ['abc', '1.2', 'v1.2.3', '1.2.3 ', '']) {
        assert.throws(
          () => parseVersion(raw),
          (err: unknown) =>
            err instanceof ParseError &&
            err.reason === 'malformed' &&
            err.code === 'PARSE_ERROR',
          raw,
        );
      }
    });

    it('takes the version from a named group', () => {
      let parser = new VersionParser('v(?<version>\\d+\\.\\d+)');
      let version = parser.parse('v4.12');
      assert.deepEqual(version.text, ['4', '12']);
      assert.equal(parser.format(version), '4.12');
    });

    it('accepts a RegExp and ignores its global flag', () => {
      let parser = new VersionParser(/\d+\.\d+/g);
      assert.equal(formatVersion(parser.parse('3.4')), '3.4');
      assert.equal(formatVersion(parser.parse('3.4')), '3.4');
    });

    it('throws a ConfigError for an invalid pattern', () => {
      assert.throws(
        () => new VersionParser('(\\d+'),
        (err: unknown) =>
          err instanceof ConfigError && err.code === 'CONFIG_ERROR',
      );
    });

    it('round-trips through format', () => {
      for (let raw of ['0.0.1', '1.2.3', '10.020.3', '1.0.0-alpha.1', '2.0.0+sha.abc']) {
        let version = parseVersion(raw);
        assert.deepStrictEqual(parseVersion(formatVersion(version)), version);
      }
    });
  });

  describe('find', () => {
    it('returns the first occurrence with its span', () => {
      let parser = new VersionParser();
      let found = parser.find('name: app\nversion: 1.4.0\n');
      assert(found != null);
      assert.equal(found.rawMatch, '1.4.0');
      assert.deepEqual(found.span, {start: 19, end: 24});
      assert.equal(formatVersion(found.parsed), '1.4.0');
    });

    it('starts searching at the given offset', () => {
      let found = new VersionParser().find('1.0.0 and 2.0.0', 1);
      assert(found != null);
      assert.equal(formatVersion(found.parsed), '2.0.0');
      assert.deepEqual(found.span, {start: 10, end: 15});
    });

    it('returns null when there is no version', () => {
      assert.equal(new VersionParser().find('no version here'), null);
    });

    it('reports the span of the named group', () => {
      let parser = new VersionParser('version: (?<version>\\d+\\.\\d+\\.\\d+)');
      let found = parser.find('x\nversion: 3.1.4');
      assert(found != null);
      assert.equal(found.rawMatch, 'version: 3.1.4');
      assert.deepEqual(found.span, {start: 11, end: 16});
    });
  });
});

describe('compareVersions', () => {
  it('orders versions', () => {
    let ordered = [
      '0.9.9',
      '1.0.0-alpha',
      '1.0.0-beta',
      '1.0.0',
      '1.0.1',
      '1.2.0',
      '1.10.0',
      '2.0.0',
    ];
    let shuffled = [
      '1.10.0',
      '1.0.0',
      '2.0.0',
      '1.0.0-beta',
      '0.9.9',
      '1.2.0',
      '1.0.0-alpha',
      '1.0.1',
    ];

    let sorted = shuffled
      .map((raw) => parseVersion(raw))
      .sort(compareVersions)
      .map(formatVersion);

    assert.deepEqual(sorted, ordered);
  });

  it('orders a strict prefix first', () => {
    let short = parseVersion('1.2', {pattern: GENERIC_VERSION_PATTERN});
    let long = parseVersion('1.2.0', {pattern: GENERIC_VERSION_PATTERN});
    assert.equal(compareVersions(short, long), -1);
    assert.equal(compareVersions(long, short), 1);
  });

  it('compares components beyond the safe integer range', () => {
    assert.equal(
      compareVersions(
        parseVersion('1.2.99999999999999999999'),
        parseVersion('1.2.99999999999999999998'),
      ),
      1,
    );
  });

  it('is transitive', () => {
    let versions = ['1.0.0', '1.0.0-rc.1', '1.0.0-rc.2', '0.1.0', '1.1.0', '01.1.0'].map(
      (raw) => parseVersion(raw),
    );

    for (let a of versions) {
      for (let b of versions) {
        assert.equal(compareVersions(a, b), -compareVersions(b, a) || 0);
        for (let c of versions) {
          if (compareVersions(a, b) <= 0 && compareVersions(b, c) <= 0) {
            assert(compareVersions(a, c) <= 0);
          }
        }
      }
    }
  });
});
