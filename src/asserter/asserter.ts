import { isNilLike, isSequenceKind, isTextKind, lengthOf } from "../classify/kinds.js";
import { isZeroValue } from "../classify/zero.js";
import { primitiveTag, sameType, type PrimitiveTypeTag } from "../classify/identity.js";
import { indexOfEqual, isEqual } from "../compare/equal.js";
import { structuralDiff } from "../diff/structural.js";
import { resolveSettings, type AsserterSettings } from "../config/options.js";
import { typeNames } from "../format/type-name.js";
import { stringify } from "../format/value.js";
import { MissingHandleError } from "../errors.js";
import type { TestHandle } from "../types/handle.js";
import {
  createContext,
  withAppendedMessage,
  withHandle,
  withMessage,
  withPrependedMessage,
  withScope,
  withSeparator,
  withStrictness,
  type AssertionContext,
  type ScopeRecorder,
} from "./context.js";
import { handleReporter, type FailureReporter } from "./failure.js";

export interface AsserterOptions extends Partial<AsserterSettings> {
  reporter?: FailureReporter;
}

/**
 * Either a primitive type tag or a constructor whose instances are expected
 */
export type TypeRef = PrimitiveTypeTag | (abstract new (...args: never[]) => unknown);

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function isThenable(value: unknown): value is PromiseLike<unknown> {
  return (
    (typeof value === "object" || typeof value === "function") &&
    value !== null &&
    typeof Reflect.get(value, "then") === "function"
  );
}

function messageOf(error: unknown): string {
  if (error instanceof Error) return error.message;
  return stringify(error);
}

function matchesType(type: TypeRef, value: unknown): boolean {
  if (typeof type === "string") {
    return primitiveTag(value) === type;
  }
  if ((typeof value !== "object" && typeof value !== "function") || value === null) {
    return false;
  }
  return Object.getPrototypeOf(value) === type.prototype;
}

/**
 * Checks bound to a test handle.
 *
 * Every check returns true when it passes. A failing check goes through the
 * failure reporter: in strict mode (the default) the handle aborts the test,
 * in lax mode the failure is recorded, the check returns false and the test
 * continues. Configuration methods (`msg`, `lax`, ...) return a new
 * asserter and leave this one untouched.
 *
 * @example
 * const is = createAsserter(handle).msg("user %d", user.id);
 * is.equal(res.status, 201);
 * is.addMsg("body: %s", body).contains(body, "created");
 */
export class Asserter {
  readonly context: AssertionContext;

  constructor(context: AssertionContext) {
    this.context = context;
  }

  get handle(): TestHandle {
    return this.context.handle;
  }

  /**
   * Same configuration, different handle. Use inside subtests.
   */
  withHandle(handle: TestHandle): Asserter {
    return new Asserter(withHandle(this.context, handle));
  }

  /**
   * Message printed with any failure, replacing a previous one
   */
  msg(format: string, ...args: unknown[]): Asserter {
    return new Asserter(withMessage(this.context, format, args));
  }

  /**
   * Append to the failure message, or set it when there is none yet
   */
  addMsg(format: string, ...args: unknown[]): Asserter {
    return new Asserter(withAppendedMessage(this.context, format, args));
  }

  /**
   * Like addMsg, but in front of the current message
   */
  prependMsg(format: string, ...args: unknown[]): Asserter {
    return new Asserter(withPrependedMessage(this.context, format, args));
  }

  /**
   * Separator placed between message parts. "" restores the default.
   */
  msgSep(separator: string): Asserter {
    return new Asserter(withSeparator(this.context, separator));
  }

  lax(): Asserter {
    return new Asserter(withStrictness(this.context, false));
  }

  strict(): Asserter {
    return new Asserter(withStrictness(this.context, true));
  }

  /**
   * Run `fn` with a lax asserter so every failing check inside it is
   * reported, then fail once, with this asserter's strictness, if any did.
   * Returns a promise when `fn` does.
   */
  laxScope(fn: (lax: Asserter) => Promise<void>): Promise<boolean>;
  laxScope(fn: (lax: Asserter) => void): boolean;
  laxScope(fn: (lax: Asserter) => void | Promise<void>): boolean | Promise<boolean> {
    const scope: ScopeRecorder = { failed: false };
    const child = new Asserter(withScope(withStrictness(this.context, false), scope));

    const settle = (): boolean => {
      if (scope.failed) {
        return this.dispatch("at least one assertion in the lax scope failed");
      }
      return true;
    };

    const result: unknown = fn(child);
    if (isThenable(result)) {
      return Promise.resolve(result).then(settle);
    }
    return settle();
  }

  /**
   * Deep comparison that tolerates convertible types (1 and 1n are equal)
   * and defers to the actual value's `isEqual` hook when it has one.
   */
  equal(actual: unknown, expected: unknown): boolean {
    this.helper();
    if (isEqual(actual, expected)) {
      return true;
    }
    return this.dispatch("got '%v' (%T). expected '%v' (%T)%s", [
      actual,
      actual,
      expected,
      expected,
      structuralDiff(actual, expected, this.context.settings.diffContext),
    ]);
  }

  notEqual(actual: unknown, unexpected: unknown): boolean {
    this.helper();
    if (!isEqual(actual, unexpected)) {
      return true;
    }
    return this.dispatch("got '%v' (%T). expected anything but '%v' (%T)", [
      actual,
      actual,
      unexpected,
      unexpected,
    ]);
  }

  oneOf(value: unknown, ...candidates: unknown[]): boolean {
    this.helper();
    if (indexOfEqual(value, candidates) >= 0) {
      return true;
    }
    return this.dispatch(
      "expected object '%T' to be equal to one of '%s', but got: %v and %v",
      [value, typeNames(candidates), value, candidates]
    );
  }

  notOneOf(value: unknown, ...candidates: unknown[]): boolean {
    this.helper();
    if (indexOfEqual(value, candidates) < 0) {
      return true;
    }
    return this.dispatch(
      "expected object '%T' not to be equal to one of '%s', but got: %v and %v",
      [value, typeNames(candidates), value, candidates]
    );
  }

  /**
   * Substring check for two strings, membership check (by `isEqual`) for
   * an array, typed array or set. Anything else fails as a misuse.
   */
  contains(container: unknown, item: unknown): boolean {
    this.helper();
    if (isTextKind(container) && isTextKind(item)) {
      if (String(container).includes(String(item))) {
        return true;
      }
      return this.dispatch("%#v expected to contain %#v", [container, item]);
    }
    if (isSequenceKind(container)) {
      for (const element of container) {
        if (isEqual(element, item)) {
          return true;
        }
      }
      return this.dispatch("%#v expected to contain %#v", [container, item]);
    }
    return this.dispatch("unexpected argument types %T and %T", [container, item]);
  }

  err(error: unknown): boolean {
    this.helper();
    if (isNilLike(error)) {
      return this.dispatch("expected error");
    }
    return true;
  }

  /**
   * Error present and its message equal to `expected`
   */
  errMsg(error: unknown, expected: string): boolean {
    this.helper();
    if (isNilLike(error)) {
      return this.dispatch("expected error %#v", [expected]);
    }
    return this.equal(messageOf(error), expected);
  }

  notErr(error: unknown): boolean {
    this.helper();
    if (!isNilLike(error)) {
      return this.dispatch("expected no error, but got: %v", [error]);
    }
    return true;
  }

  nil(value: unknown): boolean {
    this.helper();
    if (!isNilLike(value)) {
      return this.dispatch("expected object '%T' to be nil, but got: %v", [value, value]);
    }
    return true;
  }

  notNil(value: unknown): boolean {
    this.helper();
    if (isNilLike(value)) {
      return this.dispatch("expected object '%T' not to be nil", [value]);
    }
    return true;
  }

  true(value: boolean): boolean {
    this.helper();
    if (value !== true) {
      return this.dispatch("expected boolean to be true");
    }
    return true;
  }

  false(value: boolean): boolean {
    this.helper();
    if (value !== false) {
      return this.dispatch("expected boolean to be false");
    }
    return true;
  }

  /**
   * Value equal to its type's zero value: 0, "", false, an empty container,
   * a struct whose fields are all zero, null or undefined
   */
  zero(value: unknown): boolean {
    this.helper();
    if (!isZeroValue(value)) {
      return this.dispatch("expected object '%T' to be zero value, but it was: %v", [value, value]);
    }
    return true;
  }

  notZero(value: unknown): boolean {
    this.helper();
    if (isZeroValue(value)) {
      return this.dispatch("expected object '%T' not to be zero value", [value]);
    }
    return true;
  }

  /**
   * Element count of an array, typed array, set, map or plain object
   */
  len(value: unknown, expected: number): boolean {
    this.helper();
    const actual = lengthOf(value);
    if (actual === undefined) {
      return this.dispatch(
        "expected object '%T' to be of length '%d', but the object is not one of array, typed array, set or map",
        [value, expected]
      );
    }
    if (actual !== expected) {
      return this.dispatch("expected object '%T' to be of length '%d' but it was: %d", [
        value,
        expected,
        actual,
      ]);
    }
    return true;
  }

  /**
   * Passes when `fn` throws, whatever it throws
   */
  shouldThrow(fn: () => unknown): boolean {
    this.helper();
    let threw = false;
    try {
      fn();
    } catch {
      threw = true;
    }
    if (!threw) {
      return this.dispatch("expected function to throw");
    }
    return true;
  }

  /**
   * Same runtime type; the values themselves are not compared
   */
  equalType(expected: unknown, actual: unknown): boolean {
    this.helper();
    if (!sameType(expected, actual)) {
      return this.dispatch("expected object '%T' to be of the same type as object '%T'", [
        expected,
        actual,
      ]);
    }
    return true;
  }

  /**
   * `actual` is exactly of the given type: a primitive tag such as
   * "number", or a constructor (subclass instances do not match)
   */
  isType(type: TypeRef, actual: unknown): boolean {
    this.helper();
    if (!matchesType(type, actual)) {
      return this.dispatch("expected object '%T' to be of type '%s'", [
        actual,
        typeof type === "string" ? type : type.name,
      ]);
    }
    return true;
  }

  /**
   * Unconditional failure
   */
  fail(message: string): false {
    this.helper();
    return this.dispatch("%s", [message]);
  }

  /**
   * Poll `predicate` until it returns true or `timeoutMs` has elapsed. The
   * predicate always runs at least once.
   */
  async waitForTrue(
    timeoutMs: number,
    predicate: () => boolean | Promise<boolean>
  ): Promise<boolean> {
    this.helper();
    const { pollIntervalMs } = this.context.settings;
    const startedAt = Date.now();

    for (;;) {
      if (await predicate()) {
        return true;
      }
      const elapsed = Date.now() - startedAt;
      if (elapsed >= timeoutMs) {
        return this.dispatch(
          "function did not return true within the timeout of %dms (waited %dms)",
          [timeoutMs, elapsed]
        );
      }
      await sleep(Math.min(pollIntervalMs, timeoutMs - elapsed));
    }
  }

  private helper(): void {
    this.context.handle.helper?.();
  }

  private dispatch(format: string, args: unknown[] = []): false {
    const { scope, strict, reporter } = this.context;
    if (scope) {
      scope.failed = true;
    }
    reporter.report(this.context, { format, args, severity: strict ? "fatal" : "error" });
    return false;
  }
}

/**
 * New strict asserter reporting through `handle`
 */
export function createAsserter(
  handle: TestHandle | null | undefined,
  options: AsserterOptions = {}
): Asserter {
  if (handle === null || handle === undefined) {
    throw new MissingHandleError();
  }
  const settings = resolveSettings(options);
  return new Asserter(createContext(handle, settings, options.reporter ?? handleReporter));
}
