/**
 * ExtensionModuleVariants — the interchangeable implementations of one
 * extension module, in discovery order.
 */

import { EmptyVariantGroupError } from '../../core/errors.js'
import type { ExtensionModule } from './types.js'

export class ExtensionModuleVariants implements Iterable<ExtensionModule> {
  private readonly _variants: readonly ExtensionModule[]

  constructor(variants: Iterable<ExtensionModule> = []) {
    this._variants = [...variants]
  }

  get size(): number {
    return this._variants.length
  }

  isEmpty(): boolean {
    return this._variants.length === 0
  }

  /**
   * The variant used when no preference applies: the first one.
   *
   * @throws {EmptyVariantGroupError} if the collection is empty
   */
  defaultVariant(): ExtensionModule {
    const first = this._variants[0]
    if (first === undefined) {
      throw new EmptyVariantGroupError()
    }
    return first
  }

  /** Logical extension name shared by every variant */
  get name(): string {
    return this.defaultVariant().name
  }

  [Symbol.iterator](): Iterator<ExtensionModule> {
    return this._variants[Symbol.iterator]()
  }

  toArray(): ExtensionModule[] {
    return [...this._variants]
  }

  /** Build a new collection from the variants matching `predicate`, order kept */
  filter(predicate: (variant: ExtensionModule) => boolean): ExtensionModuleVariants {
    return new ExtensionModuleVariants(this._variants.filter(predicate))
  }

  /**
   * Pick one variant.
   *
   * Starts from the default variant. When `preferred` names a variant for
   * this extension, the first variant carrying that name wins instead; an
   * unknown preferred name leaves the default in place.
   *
   * @param preferred - Extension name to preferred variant name
   * @throws {EmptyVariantGroupError} if the collection is empty
   */
  chooseVariant(preferred: ReadonlyMap<string, string>): ExtensionModule {
    const fallback = this.defaultVariant()
    const wanted = preferred.get(fallback.name)
    if (wanted === undefined) {
      return fallback
    }
    return this._variants.find((em) => em.variant === wanted) ?? fallback
  }
}
