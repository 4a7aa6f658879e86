import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { FileDocumentGenerator } from "../src/documents/file-generator.js";
import { ValidationError } from "../src/errors.js";
import { echoRegistry, StaticOrchestrator } from "./helpers.js";

describe("FileDocumentGenerator", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "research-docs-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("writes one file per format", async () => {
    const generator = new FileDocumentGenerator(dir);
    const artifacts = await generator.generate("Body", ["markdown", "json"], { taskId: "swarm_1", title: "Report" });

    expect(artifacts).toEqual([
      { format: "markdown", location: join(dir, "swarm_1.md"), bytes: 15 },
      { format: "json", location: join(dir, "swarm_1.json"), bytes: 45 },
    ]);
    expect(await readFile(join(dir, "swarm_1.md"), "utf8")).toBe("# Report\n\nBody\n");
    expect(JSON.parse(await readFile(join(dir, "swarm_1.json"), "utf8"))).toEqual({ title: "Report", content: "Body" });
  });

  it("rejects unknown formats before writing anything", async () => {
    const generator = new FileDocumentGenerator(dir);
    await expect(generator.generate("Body", ["markdown", "pdf"], { taskId: "t", title: "T" })).rejects.toThrow(
      ValidationError,
    );
  });

  it("attaches artifacts to a completed workflow", async () => {
    const orch = new StaticOrchestrator(
      { agents: echoRegistry(), documents: new FileDocumentGenerator(dir) },
      [{ id: "a", description: "A" }],
      { generateDocuments: true, documentFormats: ["text"] },
    );
    const result = await orch.executeWorkflow("t", "Notes", {}, undefined, { taskId: "static_1" });

    expect(result.artifacts).toEqual([{ format: "text", location: join(dir, "static_1.txt"), bytes: 18 }]);
    expect(await readFile(join(dir, "static_1.txt"), "utf8")).toBe("Notes\n\n## a\nout:a\n");
  });
});
