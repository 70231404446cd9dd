import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { InvalidArgumentsError, renderToolContent } from "@steward/agent-runtime-core";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  DeleteFileTool,
  EditFileTool,
  ListFilesTool,
  ReadFileTool,
  WriteFileTool,
} from "../tools/core/file";
import { SearchCodeTool } from "../tools/core/search";

describe("file tools", () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), "file-tools-"));
    await fs.mkdir(path.join(root, "src"));
    await fs.writeFile(path.join(root, "src", "main.ts"), "const answer = 41;\nexport { answer };\n");
    await fs.writeFile(path.join(root, "src", "util.ts"), "export const greet = () => 'hi';\n");
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it("reads a file with line numbers", async () => {
    const result = await new ReadFileTool().execute({ path: "src/main.ts", endLine: 1 }, { projectRoot: root });

    expect(result.success).toBe(true);
    expect(renderToolContent(result)).toBe("1: const answer = 41;");
  });

  it("describes a write to a new file as create_file", async () => {
    const change = await new WriteFileTool().proposeAction(
      { path: "src/new.ts", content: "x\n" },
      { projectRoot: root }
    );

    expect(change).toEqual({ kind: "create_file", path: "src/new.ts", content: "x\n" });
  });

  it("describes a write to an existing file as modify_file with the old content", async () => {
    const change = await new WriteFileTool().proposeAction(
      { path: "src/util.ts", content: "replaced\n" },
      { projectRoot: root }
    );

    expect(change).toEqual({
      kind: "modify_file",
      path: "src/util.ts",
      oldContent: "export const greet = () => 'hi';\n",
      newContent: "replaced\n",
    });
  });

  it("writes files and creates missing directories", async () => {
    const result = await new WriteFileTool().execute(
      { path: "src/nested/deep.ts", content: "deep" },
      { projectRoot: root }
    );

    expect(result.success).toBe(true);
    expect(renderToolContent(result)).toBe("Wrote 4 bytes to src/nested/deep.ts");
    expect(await fs.readFile(path.join(root, "src", "nested", "deep.ts"), "utf-8")).toBe("deep");
  });

  it("rejects invalid arguments without touching the disk", async () => {
    const result = await new WriteFileTool().execute({ path: "src/x.ts" }, { projectRoot: root });

    expect(result.success).toBe(false);
    expect(result.error?.code).toBe("INVALID_ARGUMENTS");
    await expect(fs.access(path.join(root, "src", "x.ts"))).rejects.toThrow();
  });

  it("edits a unique fragment and returns a diff", async () => {
    const tool = new EditFileTool();
    const result = await tool.execute(
      { path: "src/main.ts", oldText: "41", newText: "42" },
      { projectRoot: root }
    );

    expect(result.success).toBe(true);
    expect(renderToolContent(result)).toContain("-const answer = 41;");
    expect(renderToolContent(result)).toContain("+const answer = 42;");
    expect(await fs.readFile(path.join(root, "src", "main.ts"), "utf-8")).toBe(
      "const answer = 42;\nexport { answer };\n"
    );
  });

  it("refuses to describe an edit whose fragment is ambiguous", async () => {
    await expect(
      new EditFileTool().proposeAction(
        { path: "src/main.ts", oldText: "answer", newText: "result" },
        { projectRoot: root }
      )
    ).rejects.toBeInstanceOf(InvalidArgumentsError);
  });

  it("replaces every occurrence when replaceAll is set", async () => {
    const change = await new EditFileTool().proposeAction(
      { path: "src/main.ts", oldText: "answer", newText: "result", replaceAll: true },
      { projectRoot: root }
    );

    expect(change).toMatchObject({
      kind: "modify_file",
      newContent: "const result = 41;\nexport { result };\n",
    });
  });

  it("deletes a file", async () => {
    const tool = new DeleteFileTool();

    expect(await tool.proposeAction({ path: "src/util.ts" }, { projectRoot: root })).toEqual({
      kind: "delete_file",
      path: "src/util.ts",
    });
    const result = await tool.execute({ path: "src/util.ts" }, { projectRoot: root });

    expect(result.success).toBe(true);
    await expect(fs.access(path.join(root, "src", "util.ts"))).rejects.toThrow();
  });

  it("lists files in sorted order", async () => {
    const result = await new ListFilesTool().execute({ path: "." }, { projectRoot: root });

    expect(result.content[0]).toEqual({
      type: "json",
      value: {
        path: ".",
        entries: [
          { path: "src", type: "directory" },
          { path: "src/main.ts", type: "file", size: 38 },
          { path: "src/util.ts", type: "file", size: 33 },
        ],
      },
    });
  });

  it("searches file contents", async () => {
    const result = await new SearchCodeTool().execute({ query: "GREET" }, { projectRoot: root });

    expect(result.content[0]).toEqual({
      type: "json",
      value: {
        query: "GREET",
        path: ".",
        matches: [{ file: "src/util.ts", line: 1, text: "export const greet = () => 'hi';" }],
      },
    });
  });
});
