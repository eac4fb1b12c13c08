/**
 * Builtins — Concrete Classes the Runtime Does Not Ship
 *
 * `Int` is a nominal integer scalar. `FrozenSet`, `Deque` and `DefaultMap`
 * are the instantiable counterparts of container shapes with no
 * built-in class, so every container kind has a constructor to resolve to.
 *
 * @module
 */

/**
 * Nominal integer type. Used only as a descriptor (`Sequence.of(Int)`);
 * values stay plain numbers.
 */
export class Int extends Number {}

// ── FrozenSet ────────────────────────────────────────────

/** Immutable set. Members are fixed at construction. */
export class FrozenSet<T> implements Iterable<T> {
    private readonly items: ReadonlySet<T>;

    constructor(values?: Iterable<T>) {
        this.items = new Set(values);
        Object.freeze(this);
    }

    get size(): number {
        return this.items.size;
    }

    has(value: T): boolean {
        return this.items.has(value);
    }

    forEach(callback: (value: T) => void): void {
        this.items.forEach(value => callback(value));
    }

    values() {
        return this.items.values();
    }

    [Symbol.iterator]() {
        return this.items.values();
    }
}

// ── Deque ────────────────────────────────────────────────

/**
 * Double-ended queue.
 *
 * With a `maxLength`, pushing onto a full deque discards an element
 * from the opposite end.
 */
export class Deque<T> implements Iterable<T> {
    private items: T[];
    readonly maxLength: number | undefined;

    constructor(values?: Iterable<T>, maxLength?: number) {
        if (maxLength !== undefined && (!Number.isInteger(maxLength) || maxLength < 0)) {
            throw new RangeError(`Deque maxLength must be a non-negative integer, received ${maxLength}`);
        }
        this.maxLength = maxLength;
        this.items = [];
        for (const value of values ?? []) this.pushBack(value);
    }

    get length(): number {
        return this.items.length;
    }

    pushBack(value: T): void {
        this.items.push(value);
        if (this.maxLength !== undefined && this.items.length > this.maxLength) {
            this.items.shift();
        }
    }

    pushFront(value: T): void {
        this.items.unshift(value);
        if (this.maxLength !== undefined && this.items.length > this.maxLength) {
            this.items.pop();
        }
    }

    popBack(): T | undefined {
        return this.items.pop();
    }

    popFront(): T | undefined {
        return this.items.shift();
    }

    peekFront(): T | undefined {
        return this.items[0];
    }

    peekBack(): T | undefined {
        return this.items[this.items.length - 1];
    }

    [Symbol.iterator]() {
        return this.items[Symbol.iterator]();
    }
}

// ── DefaultMap ───────────────────────────────────────────

/**
 * Map that fills missing keys from a factory on first read.
 * Without a factory it behaves like a plain `Map`.
 */
export class DefaultMap<K, V> extends Map<K, V> {
    readonly defaultFactory: (() => V) | undefined;

    constructor(defaultFactory?: () => V, entries?: Iterable<readonly [K, V]>) {
        super(entries);
        this.defaultFactory = defaultFactory;
    }

    override get(key: K): V | undefined {
        if (!this.has(key) && this.defaultFactory !== undefined) {
            const value = this.defaultFactory();
            this.set(key, value);
            return value;
        }
        return super.get(key);
    }
}
