/**
 * Tests for the Artifact Synthesizer
 */

import { describe, it, expect, beforeAll } from "vitest";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { compileTemplateBundle, loadTemplateBundle, TEMPLATE_FILES } from "../../src/codegen/bundle.js";
import { ArtifactSynthesizer } from "../../src/codegen/synthesizer.js";
import type { TemplateBundle } from "../../src/codegen/types.js";
import { validateArtifact } from "../../src/codegen/validator.js";
import { writeArtifact } from "../../src/codegen/writer.js";
import { SynthesisError } from "../../src/errors.js";
import type { ExamplePair } from "../../src/patterns/types.js";

const AMOUNTS: ExamplePair[] = [
  { input: { amount: "1,000,000" }, output: { amount: 1000000 } },
  { input: { amount: "1,000,000" }, output: { amount: 1000000 } },
  { input: { amount: "1,000,000" }, output: { amount: 1000000 } },
];

describe("ArtifactSynthesizer", () => {
  let bundle: TemplateBundle;

  beforeAll(async () => {
    bundle = await loadTemplateBundle();
  });

  describe("analyze", () => {
    it("should derive names and rules from the examples", () => {
      const analysis = new ArtifactSynthesizer().analyze({ name: "invoice_amount", examples: AMOUNTS });
      expect(analysis.symbolName).toBe("InvoiceAmountExtractor");
      expect(analysis.modelName).toBe("InvoiceAmountRecord");
      expect(analysis.version).toBe("1.0.0");
      expect(analysis.domain).toBe("generic");
      expect(analysis.threshold).toBe(0.7);
      expect(analysis.parsingRules).toContain(
        "Write numbers as plain JSON numbers without currency symbols or thousands separators."
      );
      expect(analysis.flags).toEqual({ guardExceptions: false, strictValidation: true });
    });

    it("should reject an invalid name", () => {
      expect(() => new ArtifactSynthesizer().analyze({ name: "Bad Name", examples: AMOUNTS })).toThrow(SynthesisError);
    });

    it("should reject an empty example list", () => {
      expect(() => new ArtifactSynthesizer().analyze({ name: "empty", examples: [] })).toThrow(
        "At least one example is required to synthesize 'empty'"
      );
    });

    it("should reject outputs that are not records", () => {
      expect(() =>
        new ArtifactSynthesizer().analyze({ name: "scalar", examples: [{ input: { a: 1 }, output: 1 }] })
      ).toThrow(SynthesisError);
    });

    it("should merge domain section markers with example hints", () => {
      const analysis = new ArtifactSynthesizer().analyze({
        name: "exec_pay",
        domain: "compensation",
        examples: [
          {
            input: "Summary Compensation Table ... Salary 100 Total 150",
            output: { salary: 100, total: 150 },
            hints: { sectionMarkers: ["Pay (USD)"], requiredKeywords: ["Bonus"] },
          },
        ],
      });
      expect(analysis.sectionMarkers).toEqual([
        "summary\\s+compensation\\s+table",
        "executive\\s+compensation",
        "Pay \\(USD\\)",
      ]);
      expect(analysis.contentRules.requiredKeywords).toEqual(["Salary", "Total", "Bonus"]);
    });
  });

  describe("synthesize", () => {
    it("should render a numeric field as a number", () => {
      const artifact = new ArtifactSynthesizer().generate({ name: "invoice_amount", examples: AMOUNTS }, bundle);
      expect(artifact.files.dataModel.fileName).toBe("invoice-amount.model.ts");
      expect(artifact.files.dataModel.content).toContain("  amount: number;\n");
      expect(artifact.files.dataModel.content).toContain("/** Amount (integer, non-negative) */");
      expect(artifact.files.dataModel.content).toContain("export interface InvoiceAmountRecord {");
    });

    it("should emit a deterministic resolver for a confident pattern", () => {
      const artifact = new ArtifactSynthesizer().generate({ name: "invoice_amount", examples: AMOUNTS }, bundle);
      const code = artifact.files.extractor.content;
      expect(code).toContain("export class InvoiceAmountExtractor {");
      expect(code).toContain("const FULLY_RESOLVED = true;");
      expect(code).toContain('{ target: ["amount"], resolve: (input) => ');
      expect(code).toContain('pick(input, ["amount"])');
    });

    it("should produce a manifest naming every file", () => {
      const artifact = new ArtifactSynthesizer().generate(
        { name: "invoice_amount", examples: AMOUNTS, version: "1.2.0" },
        bundle
      );
      const manifest = JSON.parse(artifact.files.manifest.content);
      expect(manifest.name).toBe("invoice_amount");
      expect(manifest.version).toBe("1.2.0");
      expect(manifest.files).toEqual({
        dataModel: "invoice-amount.model.ts",
        prompt: "invoice-amount.prompt.md",
        extractor: "invoice-amount.extractor.ts",
        tests: "invoice-amount.extractor.test.ts",
        manifest: "manifest.json",
      });
      expect(manifest.refinements).toEqual([]);
    });

    it("should embed the prompt with its input placeholder", () => {
      const artifact = new ArtifactSynthesizer().generate({ name: "invoice_amount", examples: AMOUNTS }, bundle);
      expect(artifact.files.prompt.content.endsWith("## Input\n\n%INPUT%\n")).toBe(true);
      expect(artifact.files.extractor.content).toContain(
        `export const PROMPT_TEMPLATE = ${JSON.stringify(artifact.files.prompt.content)};`
      );
    });

    it("should render section markers for section-locating domains", () => {
      const artifact = new ArtifactSynthesizer().generate(
        {
          name: "exec_pay",
          domain: "compensation",
          examples: [{ input: "Salary 100 Total 150", output: { salary: 100, total: 150 } }],
        },
        bundle
      );
      expect(artifact.files.extractor.content).toContain(
        'new RegExp("summary\\\\s+compensation\\\\s+table", "im"),'
      );
    });

    it("should leave the marker list empty for generic domains", () => {
      const artifact = new ArtifactSynthesizer().generate({ name: "invoice_amount", examples: AMOUNTS }, bundle);
      expect(artifact.files.extractor.content).toContain("export const SECTION_MARKERS: RegExp[] = [\n];");
    });

    it("should be deterministic", () => {
      const synthesizer = new ArtifactSynthesizer();
      const a = synthesizer.generate({ name: "invoice_amount", examples: AMOUNTS }, bundle);
      const b = synthesizer.generate({ name: "invoice_amount", examples: AMOUNTS }, bundle);
      expect(b.files).toEqual(a.files);
    });

    it("should pass static validation", () => {
      const artifact = new ArtifactSynthesizer().generate({ name: "invoice_amount", examples: AMOUNTS }, bundle);
      expect(validateArtifact(artifact)).toEqual({ valid: true, errors: [] });
    });

    it("should fail with SynthesisError when a template names an unknown variable", () => {
      const broken = compileTemplateBundle({
        dataModel: "x",
        prompt: "%INPUT%",
        extractor: "x",
        tests: "x",
        manifest: "{{ releaseNotes }}",
      });
      const synthesizer = new ArtifactSynthesizer();
      try {
        synthesizer.synthesize(synthesizer.analyze({ name: "invoice_amount", examples: AMOUNTS }), broken);
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(SynthesisError);
        expect((error as SynthesisError).variable).toBe("releaseNotes");
        expect((error as SynthesisError).template).toBe(TEMPLATE_FILES.manifest);
      }
    });
  });

  describe("writeArtifact", () => {
    it("should write every part into the artifact directory", async () => {
      const root = await mkdtemp(join(tmpdir(), "exemplar-codegen-"));
      try {
        const artifact = new ArtifactSynthesizer().generate({ name: "invoice_amount", examples: AMOUNTS }, bundle);
        const written = await writeArtifact(artifact, root);
        expect(written.paths).toHaveLength(5);
        const model = await readFile(join(root, "invoice_amount", "invoice-amount.model.ts"), "utf-8");
        expect(model).toBe(artifact.files.dataModel.content);
      } finally {
        await rm(root, { recursive: true, force: true });
      }
    });
  });
});
