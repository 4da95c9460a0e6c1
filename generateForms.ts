import path from "node:path";
import fs from "node:fs/promises";

import { writeFormPdf, type BuildOptions } from "./buildForm.ts";
import { basicForm, choiceFieldsForm, mixedForm, textFieldsForm } from "./fieldMap.ts";
import type { FormLayout } from "./formSpec.ts";

export type WriteOptions = BuildOptions & {
  /** Receives the confirmation line. Defaults to console.log. */
  log?: (line: string) => void;
};

export type GenerateOptions = WriteOptions & {
  outputDir: string;
  /** Stamped into the mixed form's footer. Defaults to now. */
  generatedAt?: Date;
};

export type GeneratedForm = { path: string; fileName: string; description: string };

async function generate(layout: FormLayout, outputPath: string, options: WriteOptions) {
  const log = options.log ?? console.log;
  await writeFormPdf(layout, outputPath, options);
  log(`Created: ${outputPath}`);
}

/** Text fields, a checkbox, a two-option radio group and a dropdown. */
export function createBasicFormPdf(outputPath: string, options: WriteOptions = {}) {
  return generate(basicForm, outputPath, options);
}

/** Six text fields, each with a different flag. */
export function createTextFieldsPdf(outputPath: string, options: WriteOptions = {}) {
  return generate(textFieldsForm, outputPath, options);
}

/** Dropdowns, a four-option radio group and three checkboxes. */
export function createChoiceFieldsPdf(outputPath: string, options: WriteOptions = {}) {
  return generate(choiceFieldsForm, outputPath, options);
}

/** A registration form with a generation timestamp in the footer. */
export function createMixedFormPdf(
  outputPath: string,
  options: WriteOptions & Pick<GenerateOptions, "generatedAt"> = {}
) {
  return generate(mixedForm(options.generatedAt ?? new Date()), outputPath, options);
}

export function formLayouts(generatedAt: Date): FormLayout[] {
  return [basicForm, textFieldsForm, choiceFieldsForm, mixedForm(generatedAt)];
}

/**
 * Writes all four fixtures into `outputDir`, creating it if needed.
 * Runs them one after another and stops at the first failure.
 */
export async function generateAllForms(options: GenerateOptions): Promise<GeneratedForm[]> {
  await fs.mkdir(options.outputDir, { recursive: true });

  const generated: GeneratedForm[] = [];
  for (const layout of formLayouts(options.generatedAt ?? new Date())) {
    const outputPath = path.join(options.outputDir, layout.fileName);
    await generate(layout, outputPath, options);
    generated.push({ path: outputPath, fileName: layout.fileName, description: layout.description });
  }
  return generated;
}
