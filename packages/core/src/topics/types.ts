export type Topic = string;

export type TopicList = readonly Topic[];

/**
 * One topic list per dimension.
 */
export type TopicSets = readonly TopicList[];

type TupleOf<E, N extends number, Acc extends E[] = []> = Acc["length"] extends N ? Acc : TupleOf<E, N, [...Acc, E]>;

/**
 * Fixed-length topic sets, e.g. `TopicSetsOf<2>` is `readonly [TopicList, TopicList]`.
 */
export type TopicSetsOf<N extends number> = number extends N ? TopicSets : Readonly<TupleOf<TopicList, N>>;
