/**
 * Text source types
 *
 * A text source turns a location (URL or file path) into the plain text the
 * summarizer segments.
 */

export interface TextSource {
  readonly name: string;
  canHandle(location: string): boolean;
  /**
   * @throws ExtractionError when the location cannot be read or decoded
   */
  extract(location: string): Promise<string>;
}
