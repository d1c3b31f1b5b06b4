/**
 * Semantic type identification, conversion and JSON round-tripping.
 *
 * @since 0.1.0
 */

export * from "./Conversion.js"
export * from "./Errors.js"
export * from "./Identification.js"
export * from "./Schemas.js"
export * from "./Serialization.js"
export * from "./Settings.js"
export * from "./Values.js"
