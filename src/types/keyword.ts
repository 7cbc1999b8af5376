/**
 * Every keyword defined by JSON-LD 1.1, including the framing keywords.
 *
 * @see https://www.w3.org/TR/json-ld11/#keywords
 */
export const Keywords = [
  "@base",
  "@container",
  "@context",
  "@default",
  "@direction",
  "@embed",
  "@explicit",
  "@graph",
  "@id",
  "@import",
  "@included",
  "@index",
  "@json",
  "@language",
  "@list",
  "@nest",
  "@none",
  "@null",
  "@omitDefault",
  "@prefix",
  "@preserve",
  "@propagate",
  "@protected",
  "@requireAll",
  "@reverse",
  "@set",
  "@type",
  "@value",
  "@version",
  "@vocab",
] as const

export type Keyword = typeof Keywords[number]

/**
 * Strings that have the form of a keyword (`"@"1*ALPHA`) but are not one are reserved and ignored with a warning.
 */
export const KEYWORD_FORM = /^@[a-zA-Z]+$/

/**
 * Single container keywords a term definition may carry in its `@container` entry.
 */
export type ContainerKeyword = "@graph" | "@id" | "@index" | "@language" | "@list" | "@set" | "@type"

/**
 * A container mapping, always normalized to an array.
 */
export type Container = Array<ContainerKeyword>

/**
 * Embedding modes for framing.
 */
export type Embed = "@always" | "@once" | "@never"

export function isKeyword(value: unknown): value is Keyword {
  return typeof value === "string" && (Keywords as ReadonlyArray<string>).includes(value)
}

export function hasKeywordForm(value: string): boolean {
  return KEYWORD_FORM.test(value)
}
