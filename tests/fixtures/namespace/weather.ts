/**
 * Second loadable artifact used by the registry tests
 */

export class WeatherExtractor {
  async extract(input: unknown): Promise<Record<string, unknown> | null> {
    return typeof input === "object" && input !== null ? { seen: true } : null;
  }
}
