export interface JsonSchema {
  type?: string
  default?: unknown
  properties?: { [key: string]: JsonSchema }
}

export const extractDefaultsFromSchema = (schema: JsonSchema, path = ''): unknown => {
  if (typeof schema.default !== 'undefined') {
    return schema.default
  }

  switch (schema.type) {
    case 'object': {
      const result: { [key: string]: unknown } = {}
      for (const key of Object.keys(schema.properties || {})) {
        const property = schema.properties && schema.properties[key]
        if (property) {
          result[key] = extractDefaultsFromSchema(property, path + '.' + key)
        }
      }
      return result
    }
    default:
      throw new Error('No default found for schema path: ' + path)
  }
}

/**
 * Parse a non-negative integer from a string, returning undefined for anything else.
 */
export const parseUnsigned = (text: string | null | undefined, max: number = 0xffffffff): number | undefined => {
  if (typeof text !== 'string' || !/^\d+$/.test(text)) {
    return undefined
  }
  const value = Number(text)
  return value <= max ? value : undefined
}
