import type { Direction, IRI, ProcessingMode, Term } from "./basic.ts"
import type { JsonObject, JsonValue } from "./document.ts"
import type { Container } from "./keyword.ts"

/**
 * A context definition: the map form of a local context, before it is merged into an active context.
 */
export type ContextDefinition = JsonObject

/**
 * A term definition is an entry in a context, where the key defines a term which may be used within a map as a key,
 * type, or elsewhere that a string is interpreted as a vocabulary item.
 *
 * @see https://www.w3.org/TR/json-ld11/#dfn-term-definition
 */
export interface TermDefinition {
  /** The IRI mapping, a keyword for aliases, or `null` for a term decoupled from IRI expansion. */
  "@id": IRI | null
  "@reverse": boolean
  "@type"?: IRI
  "@language"?: string | null
  "@direction"?: Direction | null
  "@container": Container
  /** The scoped context, kept unprocessed until the term is used. */
  "@context"?: JsonValue
  "@base"?: IRI | null
  "@index"?: string
  "@nest"?: string
  "@prefix": boolean
  "@protected": boolean
}

/**
 * An active context is a context that is used to resolve terms while the processing algorithm is running.
 *
 * @see https://www.w3.org/TR/json-ld11-api/#dfn-active-context
 */
export interface ActiveContext {
  termDefinitions: Map<Term, TermDefinition>
  baseIri: IRI | null
  originalBaseUrl: IRI | null
  vocabularyMapping: IRI | null
  defaultLanguage: string | null
  defaultBaseDirection: Direction | null
  /** The context to revert to when a non-propagated context goes out of scope. */
  previousContext: ActiveContext | null
  processingMode: ProcessingMode
  /** Computed on first use by compaction, reset whenever the context changes. */
  inverseContext: InverseContext | null
}

/**
 * Terms keyed by language (`@language`), datatype (`@type`) or `@none` (`@any`).
 */
export type LanguageMap = Map<string, Term>
export type TypeMap = Map<string, Term>
export type AnyMap = Map<string, Term>

export interface TypeLanguageMap {
  "@language": LanguageMap
  "@type": TypeMap
  "@any": AnyMap
}

/**
 * For each container mapping (sorted keywords concatenated, `@none` when there is none), the type/language map.
 */
export type ContainerMap = Map<string, TypeLanguageMap>

/**
 * The inverse context maps IRIs to the terms that expand to them, organized for term selection.
 *
 * @see https://www.w3.org/TR/json-ld11-api/#inverse-context-creation
 */
export type InverseContext = Map<IRI, ContainerMap>
