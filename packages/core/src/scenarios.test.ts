import { describe, expect, it } from "vitest";
import {
  createHub,
  createTopicHub1,
  createTopicHub2,
  type Hub,
  type ReactiveHub,
  withReactiveHub,
  withStatefulHub,
  withTopicHub1,
} from "./index.js";

describe("end-to-end scenarios", () => {
  it("single-dimension topic routing", () => {
    const hub = createTopicHub1<number>();
    const a: number[] = [];
    hub.subscribe(["x"], (value) => a.push(value));

    hub.notify(["x"], 2);
    hub.notify(["y"], 3);

    expect(a).toEqual([2]);
  });

  it("two-dimensional routing needs both dimensions", () => {
    const hub = createTopicHub2<string>();
    const seen: string[] = [];
    hub.subscribe(["x"], ["y"], (value) => seen.push(value));

    hub.notify(["x"], ["z"], "no");
    hub.notify(["x"], ["y"], "yes");

    expect(seen).toEqual(["yes"]);
  });

  it("double unsubscribe has no extra effect", () => {
    withTopicHub1<number, void>((hub) => {
      const seen: number[] = [];
      const unsubscribeA = hub.subscribe(["*"], (value) => seen.push(value));
      hub.subscribe(["*"], () => {});

      unsubscribeA();
      unsubscribeA();
      hub.notify(["t"], 1);

      expect(seen).toEqual([]);
      expect(hub.size).toBe(1);
    });
  });

  it("reactive counter", () => {
    let count = 1;
    withReactiveHub(
      () => {
        count += 1;
        return count;
      },
      (hub: ReactiveHub<number>) => {
        expect(hub.notify()).toBe(2);
        expect(hub.state()).toBe(2);
      },
    );
  });

  it("passes hubs through other hubs", () => {
    const inbox = createHub<string>();
    const received: string[] = [];
    inbox.subscribe((message) => received.push(message));

    withStatefulHub<Hub<string> | null, void>(null, (routes) => {
      routes.subscribe((target) => target?.notify("routed"));
      routes.notify(inbox);
      expect(routes.state()).toBe(inbox);
    });

    expect(received).toEqual(["routed"]);
  });
});
