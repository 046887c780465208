// CHANGE: Scenario tests for the reset flow against in-process fakes
// WHY: Prompt order, the confirmation gate and exit-code reporting are the tool's whole contract
// INVARIANT: ∀ run: dispatched.length > 0 → "confirm" ∈ prompts
// PURITY: SHELL - tests Effect-based orchestration with fake services

import { Effect } from "effect";
import { describe, expect, it } from "vitest";

import { runReset } from "../../src/app/runReset.js";
import { ConfigError, ExecError } from "../../src/core/errors.js";
import {
	type FakeOptions,
	type FakeRun,
	fakeServices,
	scriptLines,
	textAt,
} from "../utils/builders.js";

const run = async (
	args: readonly string[],
	options: FakeOptions = {},
): Promise<FakeRun & { readonly code: number }> => {
	const fake = fakeServices(options);
	const code = await Effect.runPromise(runReset(args, fake.services));
	return { ...fake, code };
};

describe("runReset: input acquisition", () => {
	it("issues only the confirmation prompt when all arguments are supplied", async () => {
		const result = await run(["3", "MYDRIVE", "Full"]);
		expect(result.prompts).toEqual(["confirm"]);
		expect(result.code).toBe(0);
	});

	it("dispatches clean all and the given label for (3, MYDRIVE, Full)", async () => {
		const result = await run(["3", "MYDRIVE", "Full"]);
		expect(result.dispatched).toHaveLength(1);
		const lines = scriptLines(result.dispatched[0]?.script ?? "");
		expect(lines[0]).toBe("select disk 3");
		expect(lines[2]).toBe("clean all");
		expect(lines).toContain('format fs=fat32 quick label="MYDRIVE"');
		expect(result.dispatched[0]?.command).toBe("diskpart");
	});

	it("prompts disk, mode, label in that order when nothing is supplied", async () => {
		const result = await run([], {
			answers: { disk: "1", mode: "fast", label: "" },
		});
		expect(result.prompts).toEqual(["disk", "mode", "label", "confirm"]);
		const lines = scriptLines(result.dispatched[0]?.script ?? "");
		expect(lines[0]).toBe("select disk 1");
		expect(lines[2]).toBe("clean");
		expect(lines[5]).toBe('format fs=fat32 quick label="USB"');
	});

	it("prompts only for the omitted fields", async () => {
		const result = await run(["7"], {
			answers: { mode: "FULL", label: "DATA" },
		});
		expect(result.prompts).toEqual(["mode", "label", "confirm"]);
		expect(scriptLines(result.dispatched[0]?.script ?? "")[2]).toBe(
			"clean all",
		);
	});

	it("treats an empty positional label as omitted", async () => {
		const result = await run(["2", "", "fast"], { answers: { label: "  " } });
		expect(result.prompts).toEqual(["label", "confirm"]);
		expect(scriptLines(result.dispatched[0]?.script ?? "")[5]).toBe(
			'format fs=fat32 quick label="USB"',
		);
	});

	it("offers the configured default label in the label question", async () => {
		const result = await run(["2"], {
			answers: { mode: "fast" },
			config: {
				diskpartCommand: "diskpart",
				powershellCommand: "pwsh",
				defaultLabel: "STICK",
			},
		});
		expect(result.questions[1]).toBe("Volume label [STICK]: ");
		expect(scriptLines(result.dispatched[0]?.script ?? "")[5]).toBe(
			'format fs=fat32 quick label="STICK"',
		);
	});
});

describe("runReset: validation before the gate", () => {
	it("rejects an unknown mode without reaching confirmation", async () => {
		const result = await run(["3", "X", "slow"]);
		expect(result.code).toBe(1);
		expect(result.prompts).toEqual([]);
		expect(result.dispatched).toEqual([]);
		expect(textAt(result.lines, "error")).toEqual([
			'❌ Invalid mode "slow": expected Fast or Full',
		]);
	});

	it("rejects a prompted non-numeric disk before asking for the mode", async () => {
		const result = await run([], { answers: { disk: "abc" } });
		expect(result.code).toBe(1);
		expect(result.prompts).toEqual(["disk"]);
		expect(textAt(result.lines, "error")).toEqual([
			'❌ Invalid disk number "abc": expected a non-negative integer',
		]);
	});

	it("rejects a negative disk argument", async () => {
		const result = await run(["-1", "X", "fast"]);
		expect(result.code).toBe(1);
		expect(result.dispatched).toEqual([]);
	});

	it("rejects unknown flags", async () => {
		const result = await run(["--yes"]);
		expect(result.code).toBe(1);
		expect(textAt(result.lines, "error")).toEqual([
			"❌ --yes: unknown option (see --help)",
		]);
	});
});

describe("runReset: confirmation gate", () => {
	it("never dispatches when the operator cancels at confirmation", async () => {
		const result = await run(["3", "MYDRIVE", "Full"], {
			cancelAt: "confirm",
		});
		expect(result.dispatched).toEqual([]);
		expect(result.code).toBe(1);
		expect(textAt(result.lines, "error")).toEqual([
			"🛑 Aborted at the confirm prompt. Nothing was sent to diskpart.",
		]);
	});

	it("never dispatches when the operator cancels at the disk prompt", async () => {
		const result = await run([], { cancelAt: "disk" });
		expect(result.prompts).toEqual(["disk"]);
		expect(result.dispatched).toEqual([]);
	});

	it("shows the full-wipe warning before confirming", async () => {
		const result = await run(["3", "MYDRIVE", "full"]);
		const warnings = textAt(result.lines, "warn");
		expect(warnings).toContain("🔥🔥🔥 FULL WIPE 🔥🔥🔥");
		expect(warnings).toContain("ALL DATA ON DISK 3 WILL BE DESTROYED.");
		expect(warnings).not.toContain("⚠️  FAST WIPE ⚠️");
	});

	it("shows the fast-wipe warning for fast mode", async () => {
		const result = await run(["3", "MYDRIVE", "fast"]);
		expect(textAt(result.lines, "warn")).toContain("⚠️  FAST WIPE ⚠️");
	});
});

describe("runReset: dispatch and report", () => {
	it("prints DONE with mode and label after a successful run", async () => {
		const result = await run(["3", "MYDRIVE", "full"]);
		const info = textAt(result.lines, "info");
		expect(info.slice(-3)).toEqual([
			"✅ DONE",
			"Mode:  Full",
			"Label: MYDRIVE",
		]);
		expect(result.raw).toEqual([
			"out:DiskPart successfully formatted the volume.\r\n",
		]);
	});

	it("flags a non-zero diskpart exit instead of printing DONE", async () => {
		const result = await run(["3", "MYDRIVE", "fast"], {
			dispatch: { exitCode: 5, stdout: "", stderr: "Access is denied." },
		});
		expect(result.code).toBe(1);
		expect(textAt(result.lines, "info")).not.toContain("✅ DONE");
		expect(textAt(result.lines, "error")).toEqual([
			"❌ FAILED: diskpart exited with code 5; the disk may be partially wiped",
		]);
		expect(textAt(result.lines, "info").slice(-2)).toEqual([
			"Mode:  Fast",
			"Label: MYDRIVE",
		]);
	});

	it("streams diskpart's stderr to the operator", async () => {
		const result = await run(["3", "MYDRIVE", "fast"], {
			dispatch: { exitCode: 5, stdout: "", stderr: "Access is denied." },
		});
		expect(result.raw).toEqual(["err:Access is denied."]);
	});

	it("flags diskpart error lines even when it exits 0", async () => {
		const result = await run(["9", "X", "fast"], {
			dispatch: {
				exitCode: 0,
				stdout:
					"Disk 9 is not a valid disk.\r\nThere is no disk selected.\r\n",
				stderr: "",
			},
		});
		expect(result.code).toBe(1);
		expect(textAt(result.lines, "info")).not.toContain("✅ DONE");
		expect(textAt(result.lines, "error")).toEqual([
			"❌ FAILED: diskpart reported an error; the disk may be partially wiped",
		]);
		expect(textAt(result.lines, "info").slice(-2)).toEqual([
			"Mode:  Fast",
			"Label: X",
		]);
	});

	it("dispatches an ASCII-only label", async () => {
		const result = await run(["1", "Café🔥Stick", "fast"]);
		expect(scriptLines(result.dispatched[0]?.script ?? "")[5]).toBe(
			'format fs=fat32 quick label="CafStick"',
		);
	});

	it("reports a diskpart that cannot be started", async () => {
		const result = await run(["3", "MYDRIVE", "fast"], {
			dispatch: new ExecError({ command: "diskpart", detail: "spawn ENOENT" }),
		});
		expect(result.code).toBe(1);
		expect(textAt(result.lines, "error")).toEqual([
			"❌ Failed to run diskpart: spawn ENOENT",
		]);
	});
});

describe("runReset: environment", () => {
	it("lists disks before the first prompt", async () => {
		const result = await run([], { answers: { disk: "1", mode: "fast" } });
		const info = textAt(result.lines, "info");
		expect(info.slice(0, 4)).toEqual([
			"🔍 Available disks:",
			"  Disk  Name            Size     Bus",
			"  ----  --------------  -------  ---",
			"  1     SanDisk Cruzer  15.0 GB  USB",
		]);
	});

	it("continues when disk listing fails", async () => {
		const result = await run(["3", "MYDRIVE", "fast"], {
			disks: new ExecError({ command: "powershell.exe", detail: "timed out" }),
		});
		expect(textAt(result.lines, "warn")[0]).toBe(
			"⚠️  Could not list disks: timed out",
		);
		expect(result.dispatched).toHaveLength(1);
		expect(result.code).toBe(0);
	});

	it("refuses to run outside Windows before prompting", async () => {
		const result = await run([], { platform: "linux" });
		expect(result.code).toBe(1);
		expect(result.prompts).toEqual([]);
		expect(textAt(result.lines, "error")).toEqual([
			'❌ Unsupported platform "linux": diskpart is only available on Windows',
		]);
	});

	it("prints usage for --help without prompting or checking the platform", async () => {
		const result = await run(["--help"], { platform: "linux" });
		expect(result.code).toBe(0);
		expect(result.prompts).toEqual([]);
		expect(textAt(result.lines, "info")[0]).toBe(
			"Usage: usb-reset [disk] [label] [mode] [--config <file>]",
		);
	});

	it("passes --config through and stops on a bad config", async () => {
		const result = await run(["--config", "custom.json"], {
			config: new ConfigError({
				path: "custom.json",
				detail: "file is not valid JSON",
			}),
		});
		expect(result.configPaths).toEqual(["custom.json"]);
		expect(result.code).toBe(1);
		expect(result.prompts).toEqual([]);
		expect(textAt(result.lines, "error")).toEqual([
			"❌ Config custom.json: file is not valid JSON",
		]);
	});
});
