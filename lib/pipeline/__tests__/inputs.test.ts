import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { examIdFromPath, listExamInputs, loadAnswerKey } from "@/lib/pipeline/inputs";

describe("exam inputs", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "inputs-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("names an exam after its file", () => {
    expect(examIdFromPath("/tmp/in/student_001.txt")).toBe("student_001");
    expect(examIdFromPath("scan.v2.txt")).toBe("scan.v2");
    expect(examIdFromPath("README")).toBe("README");
  });

  it("lists matching files sorted by name", async () => {
    for (const name of ["b.txt", "a.TXT", "notes.md", "C.txt"]) fs.writeFileSync(path.join(dir, name), "");
    const inputs = await listExamInputs(dir);
    expect(inputs).toEqual([
      { examId: "C", filePath: path.join(dir, "C.txt") },
      { examId: "a", filePath: path.join(dir, "a.TXT") },
      { examId: "b", filePath: path.join(dir, "b.txt") },
    ]);
  });

  it("fails when nothing matches", async () => {
    fs.writeFileSync(path.join(dir, "notes.md"), "");
    await expect(listExamInputs(dir)).rejects.toMatchObject({ code: "NO_INPUTS" });
    await expect(listExamInputs(path.join(dir, "missing"))).rejects.toMatchObject({ code: "INPUT_DIR_UNREADABLE" });
  });

  it("reads an answer key and wraps bare answers", async () => {
    const file = path.join(dir, "key.json");
    fs.writeFileSync(file, JSON.stringify({ Q1: { answer: "4", points: 2 }, " Q2 ": "x = 3", "": "ignored" }));
    expect(await loadAnswerKey(file)).toEqual({ Q1: { answer: "4", points: 2 }, Q2: { answer: "x = 3" } });
  });

  it("treats a missing answer key as none", async () => {
    expect(await loadAnswerKey(path.join(dir, "missing.json"))).toBeNull();
    expect(await loadAnswerKey(null)).toBeNull();
  });

  it("rejects an answer key that is not an object", async () => {
    const file = path.join(dir, "key.json");
    fs.writeFileSync(file, "[1, 2]");
    await expect(loadAnswerKey(file)).rejects.toMatchObject({ code: "ANSWER_KEY_INVALID" });
    fs.writeFileSync(file, "{not json");
    await expect(loadAnswerKey(file)).rejects.toMatchObject({ code: "ANSWER_KEY_INVALID" });
  });
});
