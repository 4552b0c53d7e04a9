#!/usr/bin/env node

import { readFile } from "fs/promises";
import { loadSettings } from "./config/load.js";
import { formatMetric, formatSideMarker, formatStatusLabel, formatValue } from "./analytics/format.js";
import { buildDashboard, type DashboardReport, type MetricLine } from "./report.js";
import { ORDER_STATUSES, STATUS_LIGHT, buildPalette } from "./visual/palette.js";

const VERSION = "1.0.0";

const cmd = process.argv[2];

function printLines(lines: readonly MetricLine[]): void {
  const width = Math.max(0, ...lines.map((l) => l.label.length));
  for (const l of lines) console.log(`   ${l.label.padEnd(width)}  ${l.text}`);
}

function render(report: DashboardReport): void {
  const { performance, holdings, portfolio, orders } = report;

  if (holdings) {
    console.log(`\n💼 Holdings`);
    printLines([holdings.equity]);
    for (const s of holdings.slices) {
      console.log(`   ${s.asset.padEnd(8)} ${formatValue(s.value, report.quoteAsset)}  ${formatMetric(s.share, { kind: "percent" })}`);
    }
  }

  console.log(`\n📊 Performance`);
  printLines(performance.lines);
  for (const side of ["BUY", "SELL", "GLOBAL"] as const) {
    const avg = performance.averageOrderSize[side];
    console.log(`   ${formatSideMarker(side)}  avg order ${formatValue(avg, report.quoteAsset)}`);
  }

  if (portfolio) {
    console.log(`\n🔍 Reconciliation`);
    printLines(portfolio.lines);
  }

  if (orders.length > 0) {
    console.log(`\n🧾 Orders`);
    for (const o of orders) {
      const colours = o.style ? `${o.style.background}/${o.style.foreground}` : "-";
      console.log(`   ${o.light} ${o.id.padEnd(12)} ${formatStatusLabel(o.status).padEnd(20)} ${colours}`);
    }
  }
}

async function runReport(): Promise<void> {
  const file = process.argv[3];
  if (!file) throw new Error("Usage: dashboard-report report <snapshot.json> [config.json]");

  const cfg = loadSettings(process.argv[4]);
  const raw: unknown = JSON.parse(await readFile(file, "utf-8"));
  render(buildDashboard(raw, cfg));
}

function runPalette(): void {
  const levels = process.argv[3] !== undefined ? Number(process.argv[3]) : loadSettings().visualDegradations;
  const palette = buildPalette(levels);

  console.log(`\n🎨 Palette, ${palette.levels} levels\n`);
  for (const status of ORDER_STATUSES) {
    const shades = palette.background.map((bg, j) => `${bg[status]}/${palette.foreground[j][status]}`);
    console.log(`   ${STATUS_LIGHT[status]} ${status.padEnd(20)} ${shades.join(" ")}`);
  }
}

async function run(): Promise<void> {
  switch (cmd) {
    case "report":
      await runReport();
      break;

    case "palette":
      runPalette();
      break;

    case "version":
      console.log(`dashboard-report v${VERSION}`);
      break;

    case "help":
    case undefined:
    default:
      console.log(`
dashboard-report: portfolio and trading metrics from back-end snapshots

Usage:
  dashboard-report report <snapshot.json> [config.json]
                                      Render the dashboard for a snapshot
  dashboard-report palette [levels]   Print the order aging palette
  dashboard-report version            Print version
  dashboard-report help               Show this help

Snapshot file (every key optional):
  balance, tickers, tradesOverview | trades, assetsOverview, orders,
  capital {equity, paidInCapital, distributions}, firstTradeAt

Environment Variables:
  QUOTE_ASSET            Asset figures are valued in (default USDT)
  FRESH_WINDOW_S         Seconds per aging bucket (default 300)
  N_VISUAL_DEGRADATIONS  Number of aging buckets (default 12, min 2)

Config Files:
  dashboard.config.json  Defaults for the above plus reconcileFields
`);
      break;
  }
}

run().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
