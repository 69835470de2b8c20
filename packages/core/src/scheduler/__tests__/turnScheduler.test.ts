import { assert, describe, test } from "@loomui/testkit";
import { isLoomError } from "../../errors.js";
import { createScheduler } from "../turnScheduler.js";

describe("TurnScheduler", () => {
  test("marks coalesce into one scheduled flush", () => {
    let scheduled = 0;
    const scheduler = createScheduler({ scheduleFlush: () => scheduled++ });
    assert.equal(scheduler.state, "idle");
    scheduler.markDirty(3);
    scheduler.markDirty(1);
    scheduler.markDirty(3);
    assert.equal(scheduler.state, "pending");
    assert.equal(scheduled, 1);
    assert.equal(scheduler.size, 2);
  });

  test("batches are handed out in comparator order", () => {
    const depth = new Map([
      [1, 2],
      [2, 0],
      [3, 1],
    ]);
    const scheduler = createScheduler({
      compare: (a, b) => (depth.get(a) ?? 0) - (depth.get(b) ?? 0) || a - b,
    });
    scheduler.markDirty(1);
    scheduler.markDirty(3);
    scheduler.markDirty(2);
    const batches: (readonly number[])[] = [];
    assert.equal(scheduler.flush((batch) => batches.push(batch)), true);
    assert.deepEqual(batches, [[2, 3, 1]]);
    assert.equal(scheduler.state, "idle");
  });

  test("flush with nothing pending is a no-op", () => {
    const scheduler = createScheduler();
    assert.equal(scheduler.flush(() => assert.fail("ran")), false);
    assert.equal(scheduler.state, "idle");
  });

  test("marks during a flush go to the next batch and reschedule", () => {
    let scheduled = 0;
    const scheduler = createScheduler({ scheduleFlush: () => scheduled++ });
    scheduler.markDirty(1);
    scheduler.flush(() => {
      assert.equal(scheduler.isFlushing, true);
      scheduler.markDirty(2);
      assert.equal(scheduler.isDirty(2), true);
    });
    assert.equal(scheduler.state, "pending");
    assert.equal(scheduled, 2);
    const batches: (readonly number[])[] = [];
    scheduler.flush((batch) => batches.push(batch));
    assert.deepEqual(batches, [[2]]);
  });

  test("re-entrant flush throws LOOM_REENTRANT_FLUSH", () => {
    const scheduler = createScheduler();
    scheduler.markDirty(1);
    scheduler.flush(() => {
      assert.throws(
        () => scheduler.flush(() => {}),
        (err: unknown) => isLoomError(err) && err.code === "LOOM_REENTRANT_FLUSH",
      );
    });
    assert.equal(scheduler.state, "idle");
  });

  test("a throwing batch still leaves the scheduler usable", () => {
    const scheduler = createScheduler();
    scheduler.markDirty(1);
    assert.throws(() =>
      scheduler.flush(() => {
        throw new Error("boom");
      }),
    );
    assert.equal(scheduler.state, "idle");
    scheduler.markDirty(1);
    assert.equal(scheduler.state, "pending");
  });

  test("cancelling the last pending mark returns to idle", () => {
    const scheduler = createScheduler();
    scheduler.markDirty(5);
    scheduler.cancel(5);
    assert.equal(scheduler.state, "idle");
    assert.equal(scheduler.isDirty(5), false);
  });
});
