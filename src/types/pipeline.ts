/**
 * Pipeline type definitions
 */

/**
 * Continuation handed to every stage. Awaiting it runs the rest of the chain.
 */
export type Next = () => Promise<void>;

export interface Stage<C> {
  readonly name: string;
  process(ctx: C, next: Next): Promise<void>;
}

export type StageFunction<C> = (ctx: C, next: Next) => Promise<void>;

/**
 * A built chain, ready to run against a context
 */
export type Pipeline<C> = (ctx: C) => Promise<void>;
