import { HubError } from "@switchboard/errors";
import { describe, expect, it } from "vitest";
import { createHub } from "../hub/Hub.js";
import {
  createFilteredHub,
  createFilteredHub2,
  createFilteredHub3,
  createFilteredHub4,
  type Envelope,
  FilteredHub,
} from "./FilteredHub.js";

describe("FilteredHub", () => {
  it("delivers when the topic lists intersect", () => {
    const hub = createFilteredHub<string, number>();
    const seen: string[] = [];

    hub.subscribe([1, 2], (value) => seen.push(value));
    hub.notify([2, 3], "shares 2");
    hub.notify([4], "shares nothing");

    expect(seen).toEqual(["shares 2"]);
  });

  it("has no wildcard", () => {
    const hub = createFilteredHub<string, string>();
    const seen: string[] = [];

    hub.subscribe(["*"], (value) => seen.push(value));
    hub.notify(["a"], "a");
    hub.notify(["*"], "star");

    expect(seen).toEqual(["star"]);
  });

  it("never matches empty topic lists", () => {
    const hub = createFilteredHub<string, number>();
    const seen: string[] = [];

    hub.subscribe([], (value) => seen.push(`empty:${value}`));
    hub.subscribe([1], (value) => seen.push(`one:${value}`));
    hub.notify([], "x");
    hub.notify([1], "y");

    expect(seen).toEqual(["one:y"]);
  });

  it("compares object topics by identity", () => {
    type Room = { id: string };
    const lobby: Room = { id: "lobby" };
    const lookalike: Room = { id: "lobby" };
    const hub = createFilteredHub<string, Room>();
    const seen: string[] = [];

    hub.subscribe([lobby], (value) => seen.push(value));
    hub.notify([lookalike], "same shape");
    hub.notify([lobby], "same object");

    expect(seen).toEqual(["same object"]);
  });

  it("accepts hubs and functions as topics", () => {
    const audit = createHub<string>();
    const handler = () => {};
    const hub = createFilteredHub<string, unknown>();
    const seen: string[] = [];

    hub.subscribe([audit], (value) => seen.push(`hub:${value}`));
    hub.subscribe([handler], (value) => seen.push(`fn:${value}`));
    hub.notify([handler], "1");
    hub.notify([audit, handler], "2");

    expect(seen).toEqual(["fn:1", "hub:2", "fn:2"]);
  });

  it("stops delivering after unsubscribe", () => {
    const hub = createFilteredHub<number, string>();
    const seen: number[] = [];

    const unsubscribe = hub.subscribe(["t"], (value) => seen.push(value));
    hub.notify(["t"], 1);
    unsubscribe();
    unsubscribe();
    hub.notify(["t"], 2);

    expect(seen).toEqual([1]);
    expect(hub.size).toBe(0);
  });

  it("is built on the public contract of a plain hub", () => {
    const inner = createHub<Envelope<string, number>>();
    const raw: Array<Envelope<string, number>> = [];
    inner.subscribe((envelope) => raw.push(envelope));

    const hub = new FilteredHub<number, string>(inner);
    hub.notify(["a", "b"], 7);

    expect(raw).toEqual([[["a", "b"], 7]]);

    hub.close();
    expect(inner.closed).toBe(true);
    expect(() => hub.notify(["a"], 8)).toThrow(HubError);
  });
});

describe("nested filtered hubs", () => {
  it("FilteredHub2 requires both dimensions to intersect", () => {
    const hub = createFilteredHub2<string, string, number>();
    const seen: string[] = [];

    hub.subscribe(["x"], [1], (value) => seen.push(value));
    hub.notify(["x"], [2], "second fails");
    hub.notify(["y"], [1], "first fails");
    hub.notify(["x", "y"], [1, 2], "both match");

    expect(seen).toEqual(["both match"]);
  });

  it("FilteredHub3 mixes topic types per dimension", () => {
    const tenant = { name: "acme" };
    const hub = createFilteredHub3<number, typeof tenant, string, boolean>();
    const seen: number[] = [];

    hub.subscribe([tenant], ["billing"], [true], (value) => seen.push(value));
    hub.notify([tenant], ["billing"], [false], 1);
    hub.notify([tenant], ["billing", "support"], [true, false], 2);
    hub.notify([{ name: "acme" }], ["billing"], [true], 3);

    expect(seen).toEqual([2]);
  });

  it("FilteredHub4 nests four levels and shares one subscriber count", () => {
    const hub = createFilteredHub4<string, number, number, number, number>({ name: "cube" });
    const seen: string[] = [];

    const unsubscribe = hub.subscribe([1], [2], [3], [4, 5], (value) => seen.push(value));
    hub.subscribe([9], [9], [9], [9], (value) => seen.push(`other:${value}`));

    hub.notify([1], [2], [3], [5], "hit");
    hub.notify([1], [2], [3], [6], "miss");

    expect(hub.size).toBe(2);
    expect(hub.name).toBe("cube");

    unsubscribe();
    hub.notify([1], [2], [3], [4], "after");

    expect(seen).toEqual(["hit"]);
    expect(hub.size).toBe(1);
  });
});
