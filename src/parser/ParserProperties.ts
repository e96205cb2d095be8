/**
 * Configuration properties for ER7 parsing.
 */

export interface ParserProperties {
  /**
   * Accept `\n` and `\r\n` as segment terminators in addition to `\r`.
   * A `\r\n` pair always counts as one terminator.
   */
  lenientNewlines: boolean;
}

/**
 * Get default parser properties
 */
export function getDefaultParserProperties(): ParserProperties {
  return {
    lenientNewlines: false,
  };
}
