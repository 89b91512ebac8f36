/**
 * Backtracking query combinators over an arbitrary tree-shaped context.
 *
 * A parser looks at its context and either produces a value or fails. Failure is `null` and
 * carries nothing: no position, no message, no side effect. Required combinators (`pOne`,
 * `pSome`, `pAll`) turn a failing child into a failing parent; optional ones (`pMany`, `pAny`,
 * `alt`, `optional`) absorb it.
 */

export type Parsed<A> = { readonly value: A } | null;

export type TreeParser<N, A> = (ctx: N) => Parsed<A>;

/** Picks the children a combinator descends into. */
export type Select<N, C> = (ctx: N) => readonly C[];

export type NonEmptyArray<A> = [A, ...A[]];

export function matched<A>(value: A): Parsed<A> {
  return { value };
}

export function runParser<N, A>(parser: TreeParser<N, A>, ctx: N): A | null {
  const r = parser(ctx);
  return r === null ? null : r.value;
}

export function pure<N, A>(value: A): TreeParser<N, A> {
  return () => matched(value);
}

export function empty<N, A = never>(): TreeParser<N, A> {
  return () => null;
}

export function ask<N>(): TreeParser<N, N> {
  return (ctx) => matched(ctx);
}

export function asks<N, A>(f: (ctx: N) => A): TreeParser<N, A> {
  return (ctx) => matched(f(ctx));
}

export function map<N, A, B>(parser: TreeParser<N, A>, f: (a: A) => B): TreeParser<N, B> {
  return (ctx) => {
    const r = parser(ctx);
    return r === null ? null : matched(f(r.value));
  };
}

/** Sequencing: run `parser`, then the parser `next` builds from its result, on the same context. */
export function chain<N, A, B>(parser: TreeParser<N, A>, next: (a: A) => TreeParser<N, B>): TreeParser<N, B> {
  return (ctx) => {
    const r = parser(ctx);
    return r === null ? null : next(r.value)(ctx);
  };
}

export function then<N, B>(first: TreeParser<N, unknown>, second: TreeParser<N, B>): TreeParser<N, B> {
  return chain(first, () => second);
}

/** Ordered choice: the first alternative that matches wins, later ones are never tried. */
export function alt<N, A>(...alternatives: TreeParser<N, A>[]): TreeParser<N, A> {
  return (ctx) => {
    for (const p of alternatives) {
      const r = p(ctx);
      if (r !== null) return r;
    }
    return null;
  };
}

export function optional<N, A>(parser: TreeParser<N, A>): TreeParser<N, A | undefined> {
  return (ctx) => parser(ctx) ?? matched(undefined);
}

/** Context switch: run `sub` against `ctx` instead of the current context. */
export function clocal<N, M, A>(ctx: M, sub: TreeParser<M, A>): TreeParser<N, A> {
  return () => sub(ctx);
}

export function pCheck<N>(predicate: (ctx: N) => boolean): TreeParser<N, void> {
  return (ctx) => (predicate(ctx) ? matched(undefined) : null);
}

/** Every selected child must match. */
export function pAll<N, C, A>(select: Select<N, C>, sub: TreeParser<C, A>): TreeParser<N, A[]> {
  return (ctx) => {
    const out: A[] = [];
    for (const child of select(ctx)) {
      const r = sub(child);
      if (r === null) return null;
      out.push(r.value);
    }
    return matched(out);
  };
}

/** Results of the children that match; the others are skipped. Never fails. */
export function pMany<N, C, A>(select: Select<N, C>, sub: TreeParser<C, A>): TreeParser<N, A[]> {
  return (ctx) => {
    const out: A[] = [];
    for (const child of select(ctx)) {
      const r = sub(child);
      if (r !== null) out.push(r.value);
    }
    return matched(out);
  };
}

export function pSome<N, C, A>(select: Select<N, C>, sub: TreeParser<C, A>): TreeParser<N, NonEmptyArray<A>> {
  return (ctx) => {
    const many = pMany(select, sub)(ctx);
    if (many === null || many.value.length === 0) return null;
    const [head, ...tail] = many.value;
    return matched<NonEmptyArray<A>>([head, ...tail]);
  };
}

/** Result of the first child (in selection order) that matches. */
export function pAny<N, C, A>(select: Select<N, C>, sub: TreeParser<C, A>): TreeParser<N, A> {
  return (ctx) => {
    for (const child of select(ctx)) {
      const r = sub(child);
      if (r !== null) return r;
    }
    return null;
  };
}

/** Exactly one selected child may match; zero or several matches fail. */
export function pOne<N, C, A>(select: Select<N, C>, sub: TreeParser<C, A>): TreeParser<N, A> {
  return (ctx) => {
    let found: Parsed<A> = null;
    for (const child of select(ctx)) {
      const r = sub(child);
      if (r === null) continue;
      if (found !== null) return null;
      found = r;
    }
    return found;
  };
}
