import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterAll, afterEach, describe, expect, it, vi } from "vitest";

import { normalizeTemplateIdentifier, runGenerate } from "../src/commands/generate.js";
import { buildNextStepsMessage, describeVcsResult } from "../src/commands/generate/report.js";
import { createTemplateRegistry, resolveBundledTemplatesRoot } from "../src/core/registry.js";

const mocks = vi.hoisted(() => ({
  success: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  step: vi.fn(),
  outro: vi.fn()
}));

vi.mock("@clack/prompts", () => ({
  log: {
    success: mocks.success,
    info: mocks.info,
    warn: mocks.warn,
    step: mocks.step,
    error: () => undefined
  },
  outro: mocks.outro
}));

describe("runGenerate", () => {
  const tempRoots: string[] = [];
  const registry = createTemplateRegistry(resolveBundledTemplatesRoot());
  const initRepository = () => ({ status: "initialized" as const });
  const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);

  afterAll(() => {
    errorSpy.mockRestore();
  });

  afterEach(() => {
    vi.clearAllMocks();
    while (tempRoots.length > 0) {
      const dir = tempRoots.pop();
      if (!dir) continue;
      rmSync(dir, { recursive: true, force: true });
    }
  });

  function makeCwd(): string {
    const dir = mkdtempSync(join(tmpdir(), "fastapi-kit-command-"));
    tempRoots.push(dir);
    return dir;
  }

  function stdoutCalls(): number {
    return (
      mocks.success.mock.calls.length +
      mocks.info.mock.calls.length +
      mocks.warn.mock.calls.length +
      mocks.step.mock.calls.length +
      mocks.outro.mock.calls.length
    );
  }

  it("creates the project with the default template and exits 0", () => {
    const cwd = makeCwd();

    const exitCode = runGenerate("my_app", {}, { cwd, registry, initRepository });

    expect(exitCode).toBe(0);
    expect(readFileSync(join(cwd, "my_app/pyproject.toml"), "utf8")).toContain('name = "my_app"');
    expect(existsSync(join(cwd, "my_app/src/my_app/main.py"))).toBe(true);
    expect(mocks.success).toHaveBeenCalledWith(`Created my_app at ${join(cwd, "my_app")}`);
    expect(mocks.info).toHaveBeenCalledWith("Renamed module 'hello_world' to 'my_app'.");
    expect(mocks.info).toHaveBeenCalledWith("Initialized git repository.");
    expect(mocks.step).toHaveBeenCalledWith(buildNextStepsMessage("my_app"));
    expect(mocks.outro).toHaveBeenCalledWith("Happy hacking!");
    expect(errorSpy).not.toHaveBeenCalled();
  });

  it("uses the selected template", () => {
    const cwd = makeCwd();

    const exitCode = runGenerate("qa_bot", { template: "langchain" }, { cwd, registry, initRepository });

    expect(exitCode).toBe(0);
    expect(existsSync(join(cwd, "qa_bot/src/qa_bot/main.py"))).toBe(true);
    expect(readFileSync(join(cwd, "qa_bot/tests/test_main.py"), "utf8")).toContain(
      "from qa_bot.main import app, get_chain"
    );
  });

  it("prints one error line and nothing else for an invalid name", () => {
    const cwd = makeCwd();

    const exitCode = runGenerate("bad-name!", {}, { cwd, registry, initRepository });

    expect(exitCode).toBe(1);
    expect(existsSync(join(cwd, "bad-name!"))).toBe(false);
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy).toHaveBeenCalledWith('Error: Invalid name "bad-name!". Name must match: ^[A-Za-z0-9_]+$');
    expect(stdoutCalls()).toBe(0);
  });

  it("exits 1 for an unknown template without creating the folder", () => {
    const cwd = makeCwd();

    const exitCode = runGenerate("my_app", { template: "unknown_template" }, { cwd, registry, initRepository });

    expect(exitCode).toBe(1);
    expect(existsSync(join(cwd, "my_app"))).toBe(false);
    expect(errorSpy).toHaveBeenCalledWith(
      'Error: Template "unknown_template" not found. Available templates: hello_world, advanced, nlp, langchain, llama.'
    );
    expect(stdoutCalls()).toBe(0);
  });

  it("matches the template identifier exactly", () => {
    const cwd = makeCwd();

    const exitCode = runGenerate("my_app", { template: " nlp " }, { cwd, registry, initRepository });

    expect(exitCode).toBe(1);
    expect(existsSync(join(cwd, "my_app"))).toBe(false);
    expect(errorSpy).toHaveBeenCalledWith(
      'Error: Template " nlp " not found. Available templates: hello_world, advanced, nlp, langchain, llama.'
    );
  });

  it("exits 1 on a second run and keeps the first project intact", () => {
    const cwd = makeCwd();
    expect(runGenerate("my_app", {}, { cwd, registry, initRepository })).toBe(0);
    writeFileSync(join(cwd, "my_app/notes.txt"), "keep me\n");
    vi.clearAllMocks();

    const exitCode = runGenerate("my_app", { template: "advanced" }, { cwd, registry, initRepository });

    expect(exitCode).toBe(1);
    expect(errorSpy).toHaveBeenCalledWith(`Error: Folder ${join(cwd, "my_app")} already exists.`);
    expect(readFileSync(join(cwd, "my_app/notes.txt"), "utf8")).toBe("keep me\n");
    expect(existsSync(join(cwd, "my_app/src/my_app/config.py"))).toBe(false);
    expect(stdoutCalls()).toBe(0);
  });

  it("warns but still succeeds when git cannot be initialized", () => {
    const cwd = makeCwd();

    const exitCode = runGenerate("my_app", {}, {
      cwd,
      registry,
      initRepository: () => ({ status: "ignored", reason: "git: not found" })
    });

    expect(exitCode).toBe(0);
    expect(mocks.warn).toHaveBeenCalledWith("Could not initialize git repository (git: not found).");
  });

  it("honours --no-git-init", () => {
    const cwd = makeCwd();
    const spyInit = vi.fn(initRepository);

    const exitCode = runGenerate("my_app", { gitInit: false }, { cwd, registry, initRepository: spyInit });

    expect(exitCode).toBe(0);
    expect(spyInit).not.toHaveBeenCalled();
    expect(mocks.info).toHaveBeenCalledWith("Skipped git initialization.");
  });

  it("reports a failed rewrite on stderr and keeps the partial folder", () => {
    const cwd = makeCwd();
    const bundleRoot = mkdtempSync(join(tmpdir(), "fastapi-kit-bundles-"));
    tempRoots.push(bundleRoot);
    mkdirSync(join(bundleRoot, "template-hello-world/src/hello_world"), { recursive: true });
    mkdirSync(join(bundleRoot, "template-hello-world/src/demo"), { recursive: true });
    const brokenRegistry = createTemplateRegistry(bundleRoot);

    const exitCode = runGenerate("demo", {}, { cwd, registry: brokenRegistry, initRepository });

    expect(exitCode).toBe(1);
    expect(errorSpy).toHaveBeenCalledWith("Error: Cannot rename src/hello_world: src/demo already exists.");
    expect(existsSync(join(cwd, "demo/src/hello_world"))).toBe(true);
  });

  it("removes the partial folder with --clean-on-failure", () => {
    const cwd = makeCwd();
    const bundleRoot = mkdtempSync(join(tmpdir(), "fastapi-kit-bundles-"));
    tempRoots.push(bundleRoot);
    mkdirSync(join(bundleRoot, "template-hello-world/src/hello_world"), { recursive: true });
    mkdirSync(join(bundleRoot, "template-hello-world/src/demo"), { recursive: true });
    const brokenRegistry = createTemplateRegistry(bundleRoot);

    const exitCode = runGenerate("demo", { cleanOnFailure: true }, { cwd, registry: brokenRegistry, initRepository });

    expect(exitCode).toBe(1);
    expect(existsSync(join(cwd, "demo"))).toBe(false);
  });
});

describe("generate command helpers", () => {
  it("falls back to the default template only when none is given", () => {
    expect(normalizeTemplateIdentifier(undefined)).toBe("hello_world");
    expect(normalizeTemplateIdentifier(" nlp ")).toBe(" nlp ");
  });

  it("describes every git outcome", () => {
    expect(describeVcsResult({ status: "initialized" })).toBe("Initialized git repository.");
    expect(describeVcsResult({ status: "skipped" })).toBe("Skipped git initialization.");
    expect(describeVcsResult({ status: "ignored", reason: "boom" })).toBe("Could not initialize git repository (boom).");
  });

  it("lists the next commands and the suggested start sequence", () => {
    const message = buildNextStepsMessage("my_app");

    expect(message).toContain("    make install\n    Install dependencies");
    expect(message).toContain("    make lint\n    Run linter");
    expect(message).toContain("We suggest that you begin by typing:\n\n    cd my_app\n    make install\n    make start");
    expect(message.endsWith("Then open http://localhost:8000/docs to see your API.")).toBe(true);
  });
});
