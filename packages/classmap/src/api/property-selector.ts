import { InvalidPropertySelectorError } from '../errors/errors.js';

/**
 * Compile-time-checked reference to one member of `T`: its name, or a
 * function returning it.
 *
 * @example
 * ```typescript
 * cm.mapProperty('email');
 * cm.mapProperty((u) => u.email);
 * cm.mapProperty((u) => String(u.createdAt)); // one primitive conversion
 * ```
 */
export type PropertySelector<T, V = unknown> = (keyof T & string) | ((source: T) => V);

/*
 * Selector functions are evaluated once against a recording proxy. Every
 * member read returns a marker; a primitive conversion of a marker returns a
 * sentinel. A selector is valid when exactly one member was read, nothing was
 * read from the marker, and it returned either the marker or the sentinel of
 * its single conversion.
 */
const STRING_SENTINEL = '\u0000docmapper:selected-member\u0000';
const NUMBER_SENTINEL = -7.291159893495633e-301;

type Trace = {
  reads: string[];
  conversions: number;
  violation?: string;
};

function createMarker(name: string, trace: Trace): object {
  const violate = (what: string) => {
    trace.violation ??= `${what} member '${name}'`;
  };
  return new Proxy({}, {
    get(_target, key) {
      if (key === Symbol.toPrimitive) {
        return (hint: string) => {
          trace.conversions += 1;
          return hint === 'number' ? NUMBER_SENTINEL : STRING_SENTINEL;
        };
      }
      violate(`reads '${String(key)}' of`);
      return undefined;
    },
    set() {
      violate('assigns into');
      return true;
    },
    has() {
      violate('inspects');
      return false;
    },
  });
}

function createSource(trace: Trace, markers: Map<string, object>): object {
  return new Proxy({}, {
    get(_target, key) {
      if (typeof key === 'symbol') {
        trace.violation ??= 'converts or inspects the source object itself';
        return undefined;
      }
      trace.reads.push(key);
      let marker = markers.get(key);
      if (!marker) {
        marker = createMarker(key, trace);
        markers.set(key, marker);
      }
      return marker;
    },
    set(_target, key) {
      trace.violation ??= `assigns '${String(key)}'`;
      return true;
    },
    has(_target, key) {
      trace.violation ??= `tests for '${String(key)}'`;
      return false;
    },
    ownKeys() {
      trace.violation ??= 'enumerates the source object';
      return [];
    },
    deleteProperty(_target, key) {
      trace.violation ??= `deletes '${String(key)}'`;
      return true;
    },
  });
}

/**
 * Resolve a selector to the name of the member it denotes.
 *
 * Accepted: a non-empty member name; `(x) => x.member`; `(x) => x.member`
 * wrapped in one primitive conversion (`String(...)`, `Number(...)`, unary
 * `+`, a template literal with nothing else in it). Rejected with
 * {@link InvalidPropertySelectorError}: anything else, including nested
 * access, several reads, arithmetic that changes the value and selectors
 * that throw.
 *
 * Only the returned value is checked, so an operation that leaves the
 * converted value unchanged (`+x.member + 0`, `` `${x.member}` + '' ``) is
 * accepted as the conversion alone.
 */
export function resolvePropertySelector<T, V>(selector: PropertySelector<T, V>): string {
  if (typeof selector === 'string') {
    if (selector.length === 0) throw new InvalidPropertySelectorError('member name is empty');
    return selector;
  }
  if (typeof selector !== 'function') {
    throw new InvalidPropertySelectorError(`expected a member name or a function, got ${typeof selector}`);
  }

  const trace: Trace = { reads: [], conversions: 0 };
  const markers = new Map<string, object>();
  let result: unknown;
  try {
    result = Reflect.apply(selector, undefined, [createSource(trace, markers)]);
  } catch (error) {
    throw new InvalidPropertySelectorError('the selector threw while being evaluated', error);
  }

  if (trace.violation) throw new InvalidPropertySelectorError(`the selector ${trace.violation}`);
  if (trace.reads.length === 0) throw new InvalidPropertySelectorError('the selector reads no member');
  if (trace.reads.length > 1) {
    throw new InvalidPropertySelectorError(`the selector reads more than one member: ${trace.reads.join(', ')}`);
  }

  const name = trace.reads[0];
  if (result === markers.get(name) && trace.conversions === 0) return name;
  if (trace.conversions === 1 && (result === STRING_SENTINEL || result === NUMBER_SENTINEL)) return name;
  throw new InvalidPropertySelectorError(`the selector does not return member '${name}' directly`);
}
