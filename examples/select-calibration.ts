/**
 * Calibration Selection Example
 *
 * Indexes a few processed arcs, then picks one for an incoming frame.
 * Run with: npx tsx examples/select-calibration.ts
 */

import { openCalibrationStore } from "@calsel/sdk";
import { mkdir, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";

const ARC_RULES = `# arcs must come from the same grating and cover the frame
OBSTYPE eq 'ARC'
GRATING eq $Hdr{GRATING}
DETECXS <= $Hdr{DETECXS}
ORACTIME
`;

async function main() {
  // Setup: rules directory and data directory
  const root = "./examples-data/select";
  const calDir = join(root, "cal");
  const dataDir = join(root, "data");
  await rm(root, { recursive: true, force: true });
  await mkdir(calDir, { recursive: true });
  await writeFile(join(calDir, "rules.arc"), ARC_RULES, "utf-8");

  console.log("📂 Opening store...");
  const store = openCalibrationStore({ rulesPath: [calDir], dataDir });

  // Index processed arcs as the pipeline produces them
  console.log("\n✏️  Indexing arcs...");
  await store.add("arc", "arc_20240101_0012", {
    OBSTYPE: "ARC",
    GRATING: "150_lpmm",
    DETECXS: 512,
    ORACTIME: 20240101.12,
    AIRMASS: 1.02,
  });
  await store.add("arc", "arc_20240101_0040", {
    OBSTYPE: "ARC",
    GRATING: "40_lpmm",
    DETECXS: 512,
    ORACTIME: 20240101.4,
  });
  await store.add("arc", "arc_20240101_0055", {
    OBSTYPE: "ARC",
    GRATING: "150_lpmm",
    DETECXS: 1024,
    ORACTIME: 20240101.55,
  });
  console.log("✅ Indexed 3 arcs");

  // Select for a science frame
  const frame = { GRATING: "150_lpmm", DETECXS: 512, ORACTIME: 20240101.6 };
  console.log("\n🔍 Selecting an arc for", frame);
  const selection = await store.select("arc", frame);

  for (const rejection of selection.rejections) {
    console.log(`   ✗ ${rejection.record.name}: ${rejection.message}`);
  }
  if (selection.status === "selected") {
    console.log(`✅ Selected ${selection.record.name} (${selection.policy})`);
  } else {
    console.log(`⚠️  No arc (${selection.reason})`);
  }

  // resolve() keeps the current arc while it stays suitable
  const current = await store.resolve("arc", frame);
  console.log("\n📌 Current arc:", current);

  // Pin an arc by hand; an unsuitable pin throws on the next resolve
  store.override("arc", "arc_20240101_0040");
  const verification = await store.verify("arc", "arc_20240101_0040", frame);
  console.log(
    "🧪 Override suitable?",
    verification.suitable ? "yes" : `no (${"message" in verification ? verification.message : "unknown"})`
  );

  const metrics = store.metrics("arc");
  console.log("\n📊 Hit rate:", metrics?.hitRate ?? 0, "p95 ms:", metrics?.p95QueryMs ?? 0);
}

main().catch((err) => {
  console.error("❌ Error:", err);
  process.exit(1);
});
