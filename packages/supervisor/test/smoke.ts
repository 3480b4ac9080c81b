/**
 * Smoke test for the supervisor package: real worker, real pipes.
 * Run with: npx tsx test/smoke.ts
 */

import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { ProcessSupervisor } from "../src/core/services/ProcessSupervisor.js";
import { Broadcaster } from "../src/core/services/Broadcaster.js";
import { NodeWorkerLauncher } from "../src/infrastructure/runner/NodeWorkerLauncher.js";
import type { RelayEvent } from "../src/core/model.js";

function fail(message: string, detail?: unknown): never {
  console.error(`❌ ${message}`, detail ?? "");
  process.exit(1);
}

async function waitUntil(check: () => boolean, timeoutMs = 5000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!check()) {
    if (Date.now() > deadline) fail("Timed out waiting");
    await new Promise((resolve) => setTimeout(resolve, 20));
  }
}

async function main() {
  console.log("🧪 Supervisor Smoke Test\n");

  const dir = await mkdtemp(path.join(tmpdir(), "relay-smoke-"));
  await writeFile(
    path.join(dir, "worker.js"),
    [
      'console.log("starting");',
      'console.log("\\u001b[32mready\\u001b[0m");',
      'process.on("SIGTERM", () => { console.log("bye"); process.exit(0); });',
      "setInterval(() => {}, 1000);",
    ].join("\n")
  );

  const events: RelayEvent[] = [];
  const broadcaster = new Broadcaster();
  broadcaster.subscribe({ id: "smoke", deliver: (event) => void events.push(event) });
  const supervisor = new ProcessSupervisor(
    new NodeWorkerLauncher(),
    { entry: "worker.js", runtime: process.execPath, runtimeArgs: [], args: [], cwd: dir, env: {} },
    broadcaster
  );

  try {
    // Test 1: Start the worker
    console.log("1. Starting the worker...");
    const started = await supervisor.start();
    if (!started.ok) fail("Start failed:", started.error);
    console.log(`   ✓ Worker started (PID ${started.value.pid})`);

    // Test 2: Second start is refused
    console.log("\n2. Starting it again...");
    const again = await supervisor.start();
    if (again.ok || again.error.code !== "Conflict") fail("Expected Conflict:", again);
    console.log("   ✓ Conflict reported");

    // Test 3: Output reaches the observer, sanitized
    console.log("\n3. Waiting for output...");
    await waitUntil(() => events.some((event) => event.type === "log" && event.text === "ready"));
    console.log("   ✓ Colored line relayed as plain text");

    // Test 4: Stop
    console.log("\n4. Stopping the worker...");
    const stopped = await supervisor.stop();
    if (!stopped.ok) fail("Stop failed:", stopped.error);
    if (supervisor.status().isRunning) fail("Still running:", supervisor.status());
    console.log(`   ✓ Worker stopped (exit code ${stopped.value.exit?.code})`);

    // Test 5: Observer saw the whole run
    console.log("\n5. Checking the event feed...");
    await broadcaster.settled();
    const last = events.at(-1);
    if (!last || last.type !== "status" || last.isRunning) fail("Missing final status:", last);
    const texts = events.flatMap((event) => (event.type === "log" ? [event.text] : []));
    if (texts.join(",") !== "starting,ready,bye") fail("Unexpected output:", texts);
    console.log("   ✓ starting, ready, bye, then stopped");

    console.log("\n✅ All smoke tests passed!\n");
  } finally {
    await supervisor.dispose();
    await rm(dir, { recursive: true, force: true });
  }
}

main().catch((err) => {
  console.error("❌ Test failed with error:", err);
  process.exit(1);
});
