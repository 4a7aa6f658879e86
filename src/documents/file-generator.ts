import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { ValidationError } from "../errors.js";
import type { DocumentGenerator } from "../orchestrator.js";
import type { ArtifactRef } from "../workflow/types.js";

const RENDERERS: Record<string, { ext: string; render(text: string, title: string): string }> = {
  markdown: { ext: "md", render: (text, title) => `# ${title}\n\n${text}\n` },
  text: { ext: "txt", render: (text, title) => `${title}\n\n${text}\n` },
  json: { ext: "json", render: (text, title) => `${JSON.stringify({ title, content: text }, null, 2)}\n` },
};

export const DOCUMENT_FORMATS = Object.keys(RENDERERS);

/** Writes the final synthesis to `<dir>/<taskId>.<ext>`, one file per format. */
export class FileDocumentGenerator implements DocumentGenerator {
  constructor(private readonly dir: string) {}

  async generate(text: string, formats: readonly string[], meta: { taskId: string; title: string }): Promise<ArtifactRef[]> {
    const unknown = formats.filter((f) => !Object.hasOwn(RENDERERS, f));
    if (unknown.length > 0) {
      throw new ValidationError("VALIDATION_FAILED", `Unsupported document format(s): ${unknown.join(", ")}`);
    }
    await mkdir(this.dir, { recursive: true });

    const artifacts: ArtifactRef[] = [];
    for (const format of formats) {
      const renderer = RENDERERS[format];
      const body = renderer.render(text, meta.title);
      const location = join(this.dir, `${meta.taskId}.${renderer.ext}`);
      await writeFile(location, body, "utf8");
      artifacts.push({ format, location, bytes: Buffer.byteLength(body, "utf8") });
    }
    return artifacts;
  }
}
