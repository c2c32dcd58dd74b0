import { describe, test } from "node:test";
import { strict as assert } from "node:assert";
import {
  DEFAULT_RUN_OPTIONS,
  validateRawConfig,
  validateRunOptions,
  type RunOptions,
} from "../../src/config/index.js";
import { ConfigError } from "../../src/shared/errors.js";

function options(overrides: Partial<RunOptions> = {}): RunOptions {
  return { ...DEFAULT_RUN_OPTIONS, root: "/src", ...overrides };
}

describe("validateRawConfig", () => {
  test("treats an empty document as an empty config", () => {
    assert.deepEqual(validateRawConfig(null), {});
    assert.deepEqual(validateRawConfig(undefined), {});
  });

  test("accepts every known option", () => {
    const raw = {
      prefix: "svc-",
      remote: "upstream",
      noPull: false,
      skipDirty: true,
      stashDirty: false,
      useRebase: true,
      fetchAllRemotes: true,
      verbose: true,
      timeout: 30,
      retries: 0,
    };
    assert.deepEqual(validateRawConfig(raw), raw);
  });

  test("rejects a document that is not a mapping", () => {
    assert.throws(() => validateRawConfig(["prefix"], "repos.yaml"), {
      name: "ConfigError",
      message: "repos.yaml: expected a mapping of option names to values",
    });
  });

  test("rejects unknown options", () => {
    assert.throws(() => validateRawConfig({ rebase: true }, "repos.yaml"), {
      message: "repos.yaml: unknown option 'rebase'",
    });
  });

  test("rejects wrongly typed values", () => {
    assert.throws(() => validateRawConfig({ skipDirty: "yes" }), {
      message: "config: 'skipDirty' must be true or false",
    });
    assert.throws(() => validateRawConfig({ remote: 1 }), {
      message: "config: 'remote' must be a string",
    });
    assert.throws(() => validateRawConfig({ timeout: 0 }), {
      message: "config: 'timeout' must be a positive number of seconds",
    });
    assert.throws(() => validateRawConfig({ retries: 1.5 }), {
      message: "config: 'retries' must be a non-negative integer",
    });
  });
});

describe("validateRunOptions", () => {
  test("accepts the defaults", () => {
    assert.doesNotThrow(() => validateRunOptions(options()));
  });

  test("rejects skip-dirty combined with stash-dirty", () => {
    assert.throws(
      () => validateRunOptions(options({ skipDirty: true, stashDirty: true })),
      (error: unknown) => {
        assert.ok(error instanceof ConfigError);
        assert.equal(error.exitCode, 2);
        assert.equal(
          error.message,
          "--skip-dirty and --stash-dirty cannot be combined; choose one way to handle local changes"
        );
        return true;
      }
    );
  });

  test("rejects remote names that could be read as flags", () => {
    assert.throws(() => validateRunOptions(options({ remote: "--upload-pack=x" })), {
      message: "Invalid remote name: '--upload-pack=x'",
    });
    assert.doesNotThrow(() => validateRunOptions(options({ remote: "my-fork.v2" })));
  });

  test("rejects a non-positive timeout and negative retries", () => {
    assert.throws(() => validateRunOptions(options({ timeoutMs: 0 })), ConfigError);
    assert.throws(() => validateRunOptions(options({ retries: -1 })), ConfigError);
  });
});
