import assert from 'assert';
import nativeFS from 'fs';
import os from 'os';
import path from 'path';
import {NodeFS} from '../src';

describe('NodeFS', () => {
  let dir: string;
  let fs: NodeFS;

  beforeEach(() => {
    dir = nativeFS.mkdtempSync(path.join(os.tmpdir(), 'version-sync-fs-'));
    fs = new NodeFS();
  });

  afterEach(() => {
    nativeFS.rmSync(dir, {recursive: true, force: true});
  });

  it('reads files as utf8 text', async () => {
    let file = path.join(dir, 'version.txt');
    nativeFS.writeFileSync(file, '1.2.3\n');

    assert.equal(await fs.readFile(file), '1.2.3\n');
  });

  it('replaces file contents without leaving temporary files behind', async () => {
    let file = path.join(dir, 'version.txt');
    nativeFS.writeFileSync(file, '1.2.3\n');

    await fs.writeFile(file, '1.2.4\n');

    assert.equal(nativeFS.readFileSync(file, 'utf8'), '1.2.4\n');
    assert.deepEqual(nativeFS.readdirSync(dir), ['version.txt']);
  });

  it('reports whether a file exists', async () => {
    let file = path.join(dir, 'present.txt');
    nativeFS.writeFileSync(file, '');

    assert.equal(await fs.exists(file), true);
    assert.equal(await fs.exists(path.join(dir, 'missing.txt')), false);
    assert.equal(await fs.exists(dir), false);
  });

  it('rejects when the target directory does not exist', async () => {
    await assert.rejects(
      fs.writeFile(path.join(dir, 'nope', 'file.txt'), 'x'),
      {code: 'ENOENT'},
    );
  });
});
