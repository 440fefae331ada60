import type { Filter } from './types.js';

type Combinator = 'where' | 'and' | 'or';

/**
 * Combines a new assertion with the filter built so far, using the
 * specified combinator to determine how it joins the existing expression.
 */
function _applyFilter(
  current: Filter | null,
  combinator: Combinator,
  newNode: Filter,
): FilterBuilder {
  if (combinator === 'where' || current === null) {
    // No existing filter: the new assertion becomes the whole expression
    return new FilterBuilder(newNode);
  }

  if ((current.kind === 'and' || current.kind === 'or') && current.kind === combinator) {
    // Flat accumulation: append to the existing and/or node
    return new FilterBuilder({ kind: combinator, filters: [...current.filters, newNode] });
  }

  // Wrap both into a new node
  return new FilterBuilder({ kind: combinator, filters: [current, newNode] });
}

/**
 * Fluent immutable filter builder. Every operation returns a new
 * FilterBuilder; existing instances are never mutated.
 */
export class FilterBuilder {
  constructor(private readonly current: Filter | null) {}

  /** Start a new expression, discarding what was built so far. */
  get where(): AttrSelector {
    return new AttrSelector(this.current, 'where', false);
  }

  /** Combine with the existing expression using AND. */
  get and(): AttrSelector {
    return new AttrSelector(this.current, 'and', false);
  }

  /** Combine with the existing expression using OR. */
  get or(): AttrSelector {
    return new AttrSelector(this.current, 'or', false);
  }

  /** The expression built so far; an empty builder matches everything. */
  build(): Filter {
    return this.current ?? { kind: 'and', filters: [] };
  }
}

/**
 * Intermediate builder step: holds the combinator and awaits an attribute name.
 */
export class AttrSelector {
  constructor(
    private readonly _current: Filter | null,
    private readonly _combinator: Combinator,
    private readonly _negate: boolean,
  ) {}

  /** Negate the next assertion. */
  get not(): AttrSelector {
    return new AttrSelector(this._current, this._combinator, !this._negate);
  }

  attr(name: string): ValueSetter {
    return new ValueSetter(this._current, this._combinator, this._negate, name);
  }
}

/**
 * Intermediate builder step: holds the attribute and awaits the assertion.
 */
export class ValueSetter {
  constructor(
    private readonly _current: Filter | null,
    private readonly _combinator: Combinator,
    private readonly _negate: boolean,
    private readonly _attr: string,
  ) {}

  equals(value: string): FilterBuilder {
    return this.complete({ kind: 'eq', attr: this._attr, value });
  }

  contains(value: string): FilterBuilder {
    return this.complete({ kind: 'sub', attr: this._attr, value });
  }

  present(): FilterBuilder {
    return this.complete({ kind: 'pres', attr: this._attr });
  }

  private complete(node: Filter): FilterBuilder {
    const assertion: Filter = this._negate ? { kind: 'andNot', filter: node } : node;
    return _applyFilter(this._current, this._combinator, assertion);
  }
}
