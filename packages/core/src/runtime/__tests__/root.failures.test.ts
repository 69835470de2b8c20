import { assert, describe, test } from "@loomui/testkit";
import { LoomFlushError, isLoomError } from "../../errors.js";
import { element, fragment, text } from "../../node/create.js";
import type { Signal } from "../../store/store.js";
import { createMemorySurface } from "../../testing/memorySurface.js";
import { component, defineComponent } from "../component.js";
import { ErrorBoundary } from "../errorBoundary.js";
import { type Root, createRoot } from "../root.js";

function setup(devMode = true, maxFailuresReported?: number) {
  const surface = createMemorySurface();
  const container = surface.createContainer();
  const warnings: string[] = [];
  const root = createRoot({
    surface,
    container,
    devMode,
    warn: (m) => warnings.push(m),
    ...(maxFailuresReported === undefined ? {} : { maxFailuresReported }),
  });
  return { surface, container, root, warnings };
}

function flushError(root: Root): LoomFlushError {
  try {
    root.flush();
  } catch (err: unknown) {
    if (err instanceof LoomFlushError) return err;
    throw err;
  }
  throw new Error("flush did not throw");
}

const Bad = defineComponent({
  name: "Bad",
  render: () => {
    throw new Error("Bad");
  },
});

describe("flush failures - render", () => {
  test("an unhandled render failure is thrown after the pass completes", () => {
    const { surface, container, root } = setup();
    root.render(element("div", {}, [component(Bad, undefined), "after"]));
    const err = flushError(root);
    assert.equal(err.code, "LOOM_FLUSH_FAILED");
    assert.equal(
      err.message,
      "flush: 1 unhandled failure(s)\n  LOOM_RENDER_THROW in <Bad> (instance 2, render): Error: Bad",
    );
    assert.equal(err.failures[0]?.phase, "render");
    assert.equal(err.failures[0]?.instanceId, 2);
    assert.deepEqual(surface.rootNode(container), element("div", {}, [fragment(), "after"]));
    assert.equal(root.state, "idle");
  });

  test("a component that fails on update keeps its previous output", () => {
    const { surface, container, root } = setup();
    const broken = root.store.signal("broken", false);
    const Flaky = defineComponent({
      name: "Flaky",
      render: (_props, ctx) => {
        if (ctx.read(broken)) throw new Error("flaky");
        return text("fine");
      },
    });
    root.render(component(Flaky, undefined));
    root.flush();
    root.store.write(broken, true);
    const err = flushError(root);
    assert.equal(err.failures[0]?.detail, "Error: flaky");
    assert.deepEqual(surface.rootNode(container), text("fine"));
  });

  test("the message lists at most maxFailuresReported failures", () => {
    const { root } = setup(true, 1);
    root.render(element("div", {}, [component(Bad, undefined), component(Bad, undefined)]));
    const err = flushError(root);
    assert.equal(err.failures.length, 2);
    assert.equal(
      err.message,
      "flush: 2 unhandled failure(s)\n  LOOM_RENDER_THROW in <Bad> (instance 2, render): Error: Bad\n  ... and 1 more",
    );
  });

  test("conditional hooks fail the render with LOOM_HOOK_ORDER", () => {
    const { surface, container, root } = setup();
    const tick = root.store.signal("tick", 0);
    let withRef = true;
    const App = defineComponent({
      name: "App",
      render: (_props, ctx) => {
        const [label] = ctx.useState("app");
        if (withRef) ctx.useRef(0);
        return text(`${label} ${String(ctx.read(tick))}`);
      },
    });
    root.render(component(App, undefined));
    root.flush();
    withRef = false;
    root.store.write(tick, 1);
    const err = flushError(root);
    assert.equal(err.failures[0]?.code, "LOOM_HOOK_ORDER");
    assert.equal(err.failures[0]?.phase, "render");
    assert.deepEqual(surface.rootNode(container), text("app 0"));
  });

  test("a throwing effect is an effect-phase failure", () => {
    const { root } = setup();
    const Eager = defineComponent({
      name: "Eager",
      render: (_props, ctx) => {
        ctx.useEffect(() => {
          throw new Error("effect broke");
        }, []);
        return text("x");
      },
    });
    root.render(component(Eager, undefined));
    const err = flushError(root);
    assert.deepEqual(
      err.failures.map((f) => [f.code, f.phase, f.component, f.detail]),
      [["LOOM_RENDER_THROW", "effect", "Eager", "Error: effect broke"]],
    );
  });

  test("a throwing cleanup is only a warning", () => {
    const { root, warnings } = setup(false);
    const Leaf = defineComponent({
      name: "Leaf",
      render: (_props, ctx) => {
        ctx.useEffect(
          () => () => {
            throw new Error("nope");
          },
          [],
        );
        return text("leaf");
      },
    });
    root.render(component(Leaf, undefined));
    root.flush();
    root.render(text("gone"));
    assert.deepEqual(root.flush().patches, [{ kind: "updateText", path: [0], value: "gone" }]);
    assert.deepEqual(warnings, ["[loom][effects] cleanup of <Leaf> (instance 2) threw: Error: nope"]);
  });
});

describe("flush failures - error handlers", () => {
  test("ErrorBoundary takes the failure and renders its fallback on the next flush", () => {
    const { surface, container, root } = setup();
    let broken = true;
    const Fragile = defineComponent({
      name: "Fragile",
      render: () => {
        if (broken) throw new Error("Bad");
        return element("p", {}, ["ok"]);
      },
    });
    const boundary: { reset?: () => void } = {};
    root.render(
      component(ErrorBoundary, {
        children: component(Fragile, undefined),
        fallback: (failure, reset) => {
          boundary.reset = reset;
          return text(`failed: ${failure.component}`);
        },
      }),
    );

    const first = root.flush();
    assert.equal(first.handled.length, 1);
    assert.equal(first.handled[0]?.component, "Fragile");
    assert.equal(root.state, "pending");
    assert.deepEqual(surface.rootNode(container), fragment());

    const second = root.flush();
    assert.deepEqual(second.rendered, [2]);
    assert.deepEqual(second.patches, [{ kind: "replaceNode", path: [0], node: text("failed: Fragile") }]);
    assert.deepEqual(
      root.inspect().instances.map((i) => i.name),
      ["Root", "ErrorBoundary"],
    );

    broken = false;
    const reset = boundary.reset;
    assert.ok(reset !== undefined);
    reset();
    const third = root.flush();
    assert.deepEqual(third.rendered, [2, 4]);
    assert.deepEqual(third.patches, [{ kind: "replaceNode", path: [0], node: element("p", {}, ["ok"]) }]);
  });

  test("a handler returning false passes the failure to the next ancestor", () => {
    const { root } = setup();
    const seen: string[] = [];
    const Inner = defineComponent({
      name: "Inner",
      render: (_props, ctx) => {
        ctx.useErrorHandler(() => {
          seen.push("inner");
          return false;
        });
        return fragment([component(Bad, undefined)]);
      },
    });
    const Outer = defineComponent({
      name: "Outer",
      render: (_props, ctx) => {
        ctx.useErrorHandler((failure) => {
          seen.push(`outer ${failure.component}`);
          return true;
        });
        return element("div", {}, [component(Inner, undefined)]);
      },
    });
    root.render(component(Outer, undefined));
    const result = root.flush();
    assert.deepEqual(seen, ["inner", "outer Bad"]);
    assert.equal(result.handled.length, 1);
  });

  test("a throwing handler is reported and the failure keeps travelling up", () => {
    const { root } = setup();
    const Outer = defineComponent({
      name: "Outer",
      render: (_props, ctx) => {
        ctx.useErrorHandler(() => {
          throw new Error("handler broke");
        });
        return element("div", {}, [component(Bad, undefined)]);
      },
    });
    root.render(component(Outer, undefined));
    const err = flushError(root);
    assert.deepEqual(
      err.failures.map((f) => [f.phase, f.component, f.detail]),
      [
        ["handler", "Outer", "Error: handler broke"],
        ["render", "Bad", "Error: Bad"],
      ],
    );
  });
});

describe("flush failures - surface", () => {
  test("a failed apply desyncs the subtree and the next render replaces it", () => {
    const { surface, container, root } = setup();
    const count = root.store.signal("count", 0);
    const App = defineComponent({
      name: "App",
      render: (_props, ctx) => element("p", {}, [String(ctx.read(count))]),
    });
    root.render(component(App, undefined));
    root.flush();

    surface.failOn("setText");
    root.store.write(count, 1);
    const err = flushError(root);
    assert.deepEqual(
      err.failures.map((f) => [f.code, f.phase, f.component, f.detail]),
      [
        [
          "LOOM_SURFACE_FAILURE",
          "apply",
          "App",
          'updateText /0/0 "1" failed: InjectedSurfaceFailure: injected failure in setText',
        ],
      ],
    );
    assert.equal(root.inspect().instances.find((i) => i.name === "App")?.desynced, true);
    assert.deepEqual(surface.rootNode(container), element("p", {}, ["0"]));

    root.store.write(count, 2);
    assert.deepEqual(root.flush().patches, [
      { kind: "replaceNode", path: [0], node: element("p", {}, ["2"]) },
    ]);
    assert.deepEqual(surface.rootNode(container), element("p", {}, ["2"]));
    assert.equal(root.inspect().instances.find((i) => i.name === "App")?.desynced, false);
  });

  test("a replace that fails to insert leaves its siblings alone", () => {
    const { surface, container, root } = setup();
    const tag = root.store.signal("tag", "div");
    const Inner = defineComponent({
      name: "Inner",
      render: (_props, ctx) => element(ctx.read(tag), {}, []),
    });
    root.render(element("ul", {}, [component(Inner, undefined), element("li", {}, ["after"])]));
    root.flush();

    surface.failOn("insertChild");
    root.store.write(tag, "span");
    const err = flushError(root);
    assert.deepEqual(
      err.failures.map((f) => f.detail),
      ["replaceNode /0/0 (element) failed: InjectedSurfaceFailure: injected failure in insertChild"],
    );
    assert.deepEqual(
      surface.rootNode(container),
      element("ul", {}, [element("div", {}, []), element("li", {}, ["after"])]),
    );

    root.store.write(tag, "p");
    assert.deepEqual(root.flush().patches, [
      { kind: "replaceNode", path: [0, 0], node: element("p", {}, []) },
    ]);
    assert.deepEqual(
      surface.rootNode(container),
      element("ul", {}, [element("p", {}, []), element("li", {}, ["after"])]),
    );
    assert.equal(root.inspect().instances.find((i) => i.name === "Inner")?.desynced, false);
  });

  test("a child rendering under a desynced parent heals the parent first", () => {
    const { surface, container, root } = setup();
    const order = root.store.signal("order", ["a", "b"]);
    const counts = { a: root.store.signal("a", 0), b: root.store.signal("b", 0) };
    const Item = defineComponent<Readonly<{ label: string; count: Signal<number> }>>({
      name: "Item",
      render: (props, ctx) => element("li", {}, [`${props.label}${String(ctx.read(props.count))}`]),
    });
    const List = defineComponent({
      name: "List",
      render: (_props, ctx) =>
        element(
          "ul",
          {},
          ctx.read(order).map((label) =>
            component(Item, { label, count: label === "a" ? counts.a : counts.b }, label),
          ),
        ),
    });
    root.render(component(List, undefined));
    root.flush();

    surface.failOn("moveChild");
    root.store.write(order, ["b", "a"]);
    const err = flushError(root);
    assert.deepEqual(
      err.failures.map((f) => [f.phase, f.component]),
      [["apply", "List"]],
    );
    assert.equal(root.inspect().instances.find((i) => i.name === "List")?.desynced, true);
    assert.deepEqual(
      surface.rootNode(container),
      element("ul", {}, [element("li", {}, ["a0"]), element("li", {}, ["b0"])]),
    );

    root.store.write(counts.a, 5);
    const result = root.flush();
    assert.deepEqual(result.rendered, [3]);
    assert.deepEqual(
      result.patches.map((p) => [p.kind, p.path]),
      [
        ["replaceNode", [0]],
        ["updateText", [0, 1, 0]],
      ],
    );
    assert.deepEqual(
      surface.rootNode(container),
      element("ul", {}, [element("li", {}, ["b0"]), element("li", {}, ["a5"])]),
    );
    assert.equal(root.inspect().instances.find((i) => i.name === "List")?.desynced, false);
  });
});

describe("duplicate key warnings", () => {
  function dupRoot(devMode: boolean) {
    const env = setup(devMode);
    const items = env.root.store.signal("items", ["1", "2"]);
    const Dup = defineComponent({
      name: "Dup",
      render: (_props, ctx) =>
        element(
          "ul",
          {},
          ctx.read(items).map((label) => element("li", { key: "x" }, [label])),
        ),
    });
    env.root.render(component(Dup, undefined));
    env.root.flush();
    return { ...env, items };
  }

  test("reported once per distinct message in dev mode", () => {
    const { root, warnings, items } = dupRoot(true);
    assert.deepEqual(warnings, []);
    root.store.write(items, ["1", "3"]);
    assert.deepEqual(root.flush().patches, [{ kind: "updateText", path: [0, 1, 0], value: "3" }]);
    assert.deepEqual(warnings, [
      '[loom][diff] LOOM_DUPLICATE_KEY: Duplicate key "x" among old children of /0 (child indices 0 and 1, li[key=x]); the later child is matched by position.',
      '[loom][diff] LOOM_DUPLICATE_KEY: Duplicate key "x" among new children of /0 (child indices 0 and 1, li[key=x]); the later child is matched by position.',
    ]);
    root.store.write(items, ["1", "4"]);
    root.flush();
    assert.equal(warnings.length, 2);
  });

  test("silent outside dev mode", () => {
    const { root, warnings, items } = dupRoot(false);
    root.store.write(items, ["1", "3"]);
    root.flush();
    assert.deepEqual(warnings, []);
  });
});

describe("createRoot - configuration", () => {
  test("maxFailuresReported must be a positive integer", () => {
    const surface = createMemorySurface();
    assert.throws(
      () => createRoot({ surface, container: surface.createContainer(), maxFailuresReported: 0 }),
      (err: unknown) =>
        isLoomError(err) &&
        err.code === "LOOM_INVALID_CONFIG" &&
        err.message === "createRoot: maxFailuresReported must be a positive integer (got 0)",
    );
  });
});
