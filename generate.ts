// generate.ts
import path from "node:path";
import { fileURLToPath } from "node:url";

import { installHint, missingRenderingPackage } from "./dependencies.ts";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

async function loadGenerator() {
  try {
    return await import("./generateForms.ts");
  } catch (err) {
    const missing = missingRenderingPackage(err);
    if (!missing) throw err;
    console.error(installHint(missing));
    process.exit(1);
  }
}

async function main() {
  const { generateAllForms } = await loadGenerator();
  const [outputArg] = process.argv.slice(2);

  // Resolve relative to this script's directory unless a directory is given
  const outputDir = outputArg
    ? path.resolve(outputArg)
    : path.join(__dirname, "docs", "test-forms");

  console.log("Generating test PDF forms...");

  const generated = await generateAllForms({
    outputDir,
    fontPath: process.env.FORM_FONT_PATH || undefined,
  });

  console.log(`\nAll test forms have been generated in: ${outputDir}`);
  console.log("\nGenerated PDFs:");
  for (const form of generated) {
    console.log(`- ${form.fileName}: ${form.description}`);
  }
}

main().catch((err: unknown) => {
  console.error(`Error generating PDFs: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
