/**
 * Loadable artifact used by the registry tests
 */

export type CompletionFn = (prompt: string, options?: { system?: string }) => Promise<unknown>;

export class InvoiceExtractor {
  constructor(private readonly complete: CompletionFn) {}

  async extract(input: unknown): Promise<Record<string, unknown> | null> {
    const raw = await this.complete(`Extract the invoice total from:\n${JSON.stringify(input)}`);
    return typeof raw === "string" ? JSON.parse(raw) : null;
  }
}

/** Not an extractor: has no extract() */
export class InvoiceFormatter {
  format(total: number): string {
    return total.toFixed(2);
  }
}

export const INVOICE_CURRENCY = "USD";
