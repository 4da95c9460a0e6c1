// dependencies.ts
const RENDERING_PACKAGES = ["pdf-lib", "@pdf-lib/fontkit"];

/** The PDF package a failed import could not find, if that is why it failed. */
export function missingRenderingPackage(err: unknown): string | undefined {
  if (!(err instanceof Error)) return undefined;
  const code = "code" in err ? err.code : undefined;
  if (code !== "ERR_MODULE_NOT_FOUND" && code !== "MODULE_NOT_FOUND") return undefined;
  return RENDERING_PACKAGES.find((name) => err.message.includes(`'${name}'`));
}

export function installHint(packageName: string) {
  return `Please install ${packageName}: npm install ${packageName}`;
}
