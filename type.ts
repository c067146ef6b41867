/**
 * Helpers for inspecting constructors at run time.
 *
 * @module
 */

/**
 * Anything that can be `new`ed into a `T`, abstract classes included.
 */
export type Constructor<T extends object = object> = (abstract new (...args: never[]) => T) & {
  readonly prototype: T;
};

/**
 * Whether `value` is a class or a function usable with `new`.
 * Arrow functions, methods and bound functions without a prototype are not.
 */
export function isConstructor(value: unknown): value is Constructor {
  if (typeof value !== "function") return false;

  const prototype: unknown = value.prototype;
  return typeof prototype === "object" && prototype !== null &&
    Object.getOwnPropertyDescriptor(prototype, "constructor")?.value === value;
}

/**
 * Whether `type` is `ancestor` or extends it, directly or further down its prototype chain.
 *
 * @example
 * ```ts
 * import { derivesFrom } from "./type.ts"
 *
 * class Base {}
 * class Derived extends Base {}
 *
 * derivesFrom(Derived, Base);   // true
 * derivesFrom(Derived, Object); // true
 * derivesFrom(Base, Derived);   // false
 * ```
 */
export function derivesFrom(type: Constructor, ancestor: Constructor): boolean {
  return type === ancestor || Object.prototype.isPrototypeOf.call(ancestor.prototype, type.prototype);
}
