import { stringify } from "yaml"

import { ConversionError, errorMessage } from "./error"

/**
 * Convert a JSON document to YAML.
 *
 * Mapping keys come out sorted, so the same document always yields the same
 * text regardless of key order in the source.
 *
 * @throws {ConversionError} when the input is not valid JSON
 */
export function convertJsonToYaml(jsonContent: string): string {
  let data: unknown
  try {
    data = JSON.parse(jsonContent)
  } catch (err) {
    throw new ConversionError(`failed to parse JSON: ${errorMessage(err)}`, {
      cause: err,
    })
  }

  try {
    return stringify(data, { sortMapEntries: true })
  } catch (err) {
    throw new ConversionError(`failed to marshal YAML: ${errorMessage(err)}`, {
      cause: err,
    })
  }
}
