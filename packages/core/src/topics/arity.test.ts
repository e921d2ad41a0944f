import { describe, expect, it, vi } from "vitest";
import { createTopicHub1, createTopicHub2, createTopicHub3, createTopicHub4 } from "./arity.js";

describe("fixed-arity topic hubs", () => {
  it("TopicHub1 routes a single topic list", () => {
    const hub = createTopicHub1<number>();
    const seen: number[] = [];

    hub.subscribe(["x"], (value) => seen.push(value));
    hub.notify(["x"], 2);
    hub.notify(["y"], 3);

    expect(seen).toEqual([2]);
    expect(hub.hub.dimensions).toBe(1);
  });

  it("TopicHub2 requires both dimensions", () => {
    const hub = createTopicHub2<string>();
    const seen: string[] = [];

    hub.subscribe(["x"], ["y"], (value) => seen.push(value));
    hub.notify(["x"], ["z"], "second fails");
    hub.notify(["x"], ["y"], "both match");

    expect(seen).toEqual(["both match"]);
  });

  it("TopicHub3 applies wildcards per dimension", () => {
    const hub = createTopicHub3<string>();
    const seen: string[] = [];

    hub.subscribe(["eu"], ["*"], ["error", "warn"], (value) => seen.push(value));
    hub.notify(["eu"], ["api"], ["warn"], "eu api warn");
    hub.notify(["us"], ["api"], ["warn"], "us api warn");
    hub.notify(["eu"], ["db"], ["info"], "eu db info");
    hub.notify(["eu", "us"], ["db"], ["*"], "anything in eu/us db");

    expect(seen).toEqual(["eu api warn", "anything in eu/us db"]);
  });

  it("TopicHub4 matches across four dimensions", () => {
    const hub = createTopicHub4<number>();
    const seen: number[] = [];

    const unsubscribe = hub.subscribe(["a"], ["b"], ["c"], ["d", "e"], (value) => seen.push(value));
    hub.notify(["a"], ["b"], ["c"], ["e"], 1);
    hub.notify(["a"], ["b"], ["x"], ["e"], 2);
    unsubscribe();
    hub.notify(["a"], ["b"], ["c"], ["e"], 3);

    expect(seen).toEqual([1]);
    expect(hub.size).toBe(0);
  });

  it("forwards lifecycle to the underlying hub", () => {
    const hub = createTopicHub2<number>({ name: "grid" });
    const closed = vi.fn();
    hub.events.on("closed", closed);
    hub.subscribe(["x"], ["y"], () => {});

    expect(hub.name).toBe("grid");
    expect(hub.size).toBe(1);

    hub.close();

    expect(hub.closed).toBe(true);
    expect(hub.hub.closed).toBe(true);
    expect(closed).toHaveBeenCalledTimes(1);
  });
});
