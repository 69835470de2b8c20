import { assert, describe, test } from "@loomui/testkit";
import { createHookHarness } from "./harness.js";

describe("useEffect", () => {
  test("runs after commit, not during render", () => {
    const h = createHookHarness();
    const log: string[] = [];
    h.render((ctx) => ctx.useEffect(() => void log.push("run"), []));
    assert.deepEqual(log, []);
    h.commit();
    assert.deepEqual(log, ["run"]);
  });

  test("empty deps run once", () => {
    const h = createHookHarness();
    let runs = 0;
    for (let i = 0; i < 3; i++) {
      h.render((ctx) => ctx.useEffect(() => void runs++, []));
      h.commit();
    }
    assert.equal(runs, 1);
  });

  test("missing deps run after every render", () => {
    const h = createHookHarness();
    let runs = 0;
    for (let i = 0; i < 3; i++) {
      h.render((ctx) => ctx.useEffect(() => void runs++));
      h.commit();
    }
    assert.equal(runs, 3);
  });

  test("changed deps clean up the previous run first", () => {
    const h = createHookHarness();
    const log: string[] = [];
    const renderWith = (dep: number) =>
      h.render((ctx) =>
        ctx.useEffect(() => {
          log.push(`run ${String(dep)}`);
          return () => log.push(`cleanup ${String(dep)}`);
        }, [dep]),
      );
    renderWith(1);
    h.commit();
    renderWith(1);
    h.commit();
    renderWith(2);
    h.commit();
    assert.deepEqual(log, ["run 1", "cleanup 1", "run 2"]);
  });

  test("an effect whose render was never committed runs on the next render", () => {
    const h = createHookHarness();
    let runs = 0;
    h.render((ctx) => ctx.useEffect(() => void runs++, []));
    h.render((ctx) => ctx.useEffect(() => void runs++, []));
    h.commit();
    assert.equal(runs, 1);
  });

  test("unmount runs cleanups in reverse declaration order", () => {
    const h = createHookHarness();
    const log: string[] = [];
    h.render((ctx) => {
      ctx.useEffect(() => () => log.push("a"), []);
      ctx.useEffect(() => () => log.push("b"), []);
    });
    h.commit();
    h.unmount();
    assert.deepEqual(log, ["b", "a"]);
  });

  test("unmount between a deps change and its commit still runs the old cleanup once", () => {
    const h = createHookHarness();
    const log: string[] = [];
    const renderWith = (dep: number) =>
      h.render((ctx) =>
        ctx.useEffect(() => {
          log.push(`run ${String(dep)}`);
          return () => log.push(`cleanup ${String(dep)}`);
        }, [dep]),
      );
    renderWith(1);
    h.commit();
    renderWith(2);
    h.unmount();
    assert.deepEqual(log, ["run 1", "cleanup 1"]);
  });

  test("a throwing cleanup is reported and the rest still run", () => {
    const h = createHookHarness();
    const log: string[] = [];
    h.render((ctx) => {
      ctx.useEffect(() => () => log.push("first"), []);
      ctx.useEffect(
        () => () => {
          throw new Error("nope");
        },
        [],
      );
    });
    h.commit();
    h.unmount();
    assert.deepEqual(log, ["first"]);
    assert.equal(h.cleanupErrors.length, 1);
    const [err] = h.cleanupErrors;
    assert.ok(err instanceof Error);
    assert.equal(err.message, "nope");
  });
});
