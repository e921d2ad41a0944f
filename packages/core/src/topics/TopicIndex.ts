import { HubReasons, hubError } from "@switchboard/errors";
import { parseDimensions, TopicListSchema, toHubIssues } from "../options/schemas.js";
import type { SubscriptionId } from "../hub/types.js";
import { WILDCARD } from "./constants.js";
import type { Topic, TopicSets } from "./types.js";

type TopicNode = {
  ids: Set<SubscriptionId>;
  children: Map<Topic, TopicNode>;
};

const createNode = (): TopicNode => ({ ids: new Set(), children: new Map() });

const isPrunable = (node: TopicNode) => node.ids.size === 0 && node.children.size === 0;

/**
 * Trie over N dimensions of topic strings.
 *
 * Level `d` of the tree is keyed by the topics of dimension `d`; an id is stored at depth N under
 * every combination of topics it was inserted with. A subscription with k topics per dimension
 * therefore occupies up to k^N leaves, and a query only walks the combinations it shares with them,
 * which is what makes the per-dimension intersections an AND across dimensions.
 *
 * Nodes left without ids and children are removed as soon as they empty.
 */
export class TopicIndex {
  readonly dimensions: number;
  #root: TopicNode = createNode();

  constructor(dimensions: number) {
    this.dimensions = parseDimensions(dimensions);
  }

  /**
   * Checks shape and element types, and folds duplicate topics inside each dimension.
   */
  validate(topicSets: TopicSets): Topic[][] {
    const received: unknown = topicSets;
    if (!Array.isArray(received) || received.length !== this.dimensions) {
      throw hubError({
        reason: HubReasons.TopicsDimensionMismatch,
        message: `Expected ${this.dimensions} topic list(s), received ${Array.isArray(received) ? received.length : typeof received}`,
        data: { expected: this.dimensions, received: Array.isArray(received) ? received.length : null },
      });
    }

    return received.map((list: unknown, dimension) => {
      const parsed = TopicListSchema.safeParse(list);
      if (!parsed.success) {
        throw hubError({
          reason: HubReasons.TopicsInvalid,
          message: `Topic list for dimension ${dimension} must be an array of strings`,
          data: { dimension, issues: toHubIssues(parsed.error) },
          cause: parsed.error,
        });
      }
      return Array.from(new Set(parsed.data));
    });
  }

  insert(topicSets: TopicSets, id: SubscriptionId): void {
    const sets = this.validate(topicSets);
    // An empty dimension can never match; inserting would only leave dangling nodes.
    if (sets.some((topics) => topics.length === 0)) return;

    const visit = (node: TopicNode, depth: number): void => {
      if (depth === this.dimensions) {
        node.ids.add(id);
        return;
      }
      for (const topic of sets[depth] ?? []) {
        let child = node.children.get(topic);
        if (!child) {
          child = createNode();
          node.children.set(topic, child);
        }
        visit(child, depth + 1);
      }
    };

    visit(this.#root, 0);
  }

  /**
   * Removes `id` from every leaf `topicSets` leads to and prunes what empties.
   * Returns whether the id was found under at least one path.
   */
  remove(topicSets: TopicSets, id: SubscriptionId): boolean {
    const sets = this.validate(topicSets);
    let removed = false;

    const visit = (node: TopicNode, depth: number): void => {
      if (depth === this.dimensions) {
        if (node.ids.delete(id)) removed = true;
        return;
      }
      for (const topic of sets[depth] ?? []) {
        const child = node.children.get(topic);
        if (!child) continue;
        visit(child, depth + 1);
        if (isPrunable(child)) node.children.delete(topic);
      }
    };

    visit(this.#root, 0);
    return removed;
  }

  /**
   * Ids whose topics intersect `query` in every dimension, with `"*"` on either side
   * counting as an intersection. An empty list in any dimension matches nothing.
   */
  match(query: TopicSets): Set<SubscriptionId> {
    const sets = this.validate(query);
    const matched = new Set<SubscriptionId>();

    const visit = (node: TopicNode, depth: number): void => {
      if (depth === this.dimensions) {
        for (const id of node.ids) matched.add(id);
        return;
      }
      const topics = sets[depth] ?? [];
      if (topics.length === 0) return;
      for (const child of candidates(node, topics)) {
        visit(child, depth + 1);
      }
    };

    visit(this.#root, 0);
    return matched;
  }

  get isEmpty(): boolean {
    return this.#root.children.size === 0;
  }

  /**
   * Number of nodes below the root.
   */
  get nodeCount(): number {
    const count = (node: TopicNode): number => {
      let total = 0;
      for (const child of node.children.values()) total += 1 + count(child);
      return total;
    };
    return count(this.#root);
  }

  clear(): void {
    this.#root = createNode();
  }
}

const candidates = (node: TopicNode, topics: Topic[]): Iterable<TopicNode> => {
  if (topics.includes(WILDCARD)) return node.children.values();

  const found = new Set<TopicNode>();
  for (const topic of topics) {
    const child = node.children.get(topic);
    if (child) found.add(child);
  }
  const wildcard = node.children.get(WILDCARD);
  if (wildcard) found.add(wildcard);
  return found;
};
