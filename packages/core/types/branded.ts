/**
 * Branded types used across core.
 */

declare const NonEmptyStringBrand: unique symbol
declare const AbsolutePathBrand: unique symbol
declare const PlatformIdBrand: unique symbol
declare const SkillNameBrand: unique symbol

type Brand<T, B extends symbol> = T & { readonly [K in B]: true }

export type NonEmptyString = Brand<string, typeof NonEmptyStringBrand>
export type AbsolutePath = Brand<string, typeof AbsolutePathBrand>
export type PlatformId = Brand<string, typeof PlatformIdBrand>
export type SkillName = Brand<string, typeof SkillNameBrand>
