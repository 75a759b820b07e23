import assert from 'assert';
import PromiseQueue from '../src/PromiseQueue';

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('PromiseQueue', () => {
  it('run() should resolve when all async functions in queue have completed', async () => {
    let queue = new PromiseQueue<number>();

    let someBooleanToBeChanged = false;
    queue.add(() =>
      Promise.resolve().then(() => {
        someBooleanToBeChanged = true;
        return 1;
      }),
    );
    await queue.run();
    assert(someBooleanToBeChanged);
  });

  it('run() should resolve an empty array when nothing was added', async () => {
    let queue = new PromiseQueue<number>();
    assert.deepEqual(await queue.run(), []);
  });

  it('returns results in insertion order, not completion order', async () => {
    let queue = new PromiseQueue<string>({maxConcurrent: 3});
    queue.add(() => delay(30).then(() => 'slow'));
    queue.add(() => delay(1).then(() => 'fast'));
    queue.add(() => delay(10).then(() => 'medium'));

    assert.deepEqual(await queue.run(), ['slow', 'fast', 'medium']);
  });

  it('constructor() should throw when provided a maxConcurrent <= 0', () => {
    assert.throws(
      () => new PromiseQueue({maxConcurrent: 0}),
      /maxConcurrent must be a positive, non-zero value/,
    );
  });

  it('never runs more than maxConcurrent tasks at once', async () => {
    let running = 0;
    let maxSeen = 0;
    let queue = new PromiseQueue<void>({maxConcurrent: 2});

    for (let i = 0; i < 6; i++) {
      queue.add(async () => {
        running++;
        maxSeen = Math.max(maxSeen, running);
        await delay(5);
        running--;
      });
    }

    await queue.run();
    assert.equal(maxSeen, 2);
  });

  it('rejects with the first error once in-flight tasks settle', async () => {
    let queue = new PromiseQueue<number>({maxConcurrent: 2});
    let finished = false;
    queue.add(() => Promise.reject(new Error('first')));
    queue.add(() =>
      delay(10).then(() => {
        finished = true;
        return 2;
      }),
    );

    await assert.rejects(queue.run(), /first/);
    assert(finished);
  });

  it('can be reused after a run completes', async () => {
    let queue = new PromiseQueue<number>();
    queue.add(() => Promise.resolve(1));
    assert.deepEqual(await queue.run(), [1]);

    queue.add(() => Promise.resolve(2));
    assert.deepEqual(await queue.run(), [2]);
  });
});
