import { mkdirSync, writeFileSync } from "fs";
import { resolve } from "path";
import * as vega from "vega";
import {
  CHART_HEIGHT,
  CHART_WIDTH,
  SYSCALL_CHART_FILE_NAME,
  TIME_CHART_FILE_NAME,
} from "../config/constants.js";
import { ResultStoreError } from "../errors.js";
import type { ResultRecord } from "../store/resultStore.js";
import { logger } from "../util/logger.js";
import { prepareSeries, type PlotPoint } from "./series.js";

export interface ChartDatum {
  x: number;
  y: number;
  series: string;
}

interface LineChartOptions {
  title: string;
  xTitle: string;
  yTitle: string;
  points: ChartDatum[];
  legend: boolean;
}

const X_AXIS_TITLE = "Record size (KiB, log scale)";

function lineChartSpec(options: LineChartOptions): vega.Spec {
  return {
    $schema: "https://vega.github.io/schema/vega/v5.json",
    width: CHART_WIDTH,
    height: CHART_HEIGHT,
    padding: 5,
    background: "white",
    title: { text: options.title },
    data: [{ name: "points", values: options.points }],
    scales: [
      {
        name: "x",
        type: "log",
        base: 2,
        domain: { data: "points", field: "x" },
        range: "width",
      },
      {
        name: "y",
        type: "linear",
        domain: { data: "points", field: "y" },
        range: "height",
        nice: true,
        zero: true,
      },
      {
        name: "color",
        type: "ordinal",
        domain: { data: "points", field: "series" },
        range: "category",
      },
    ],
    axes: [
      {
        orient: "bottom",
        scale: "x",
        title: options.xTitle,
        grid: true,
        gridDash: [4, 4],
        gridOpacity: 0.4,
      },
      {
        orient: "left",
        scale: "y",
        title: options.yTitle,
        grid: true,
        gridDash: [4, 4],
        gridOpacity: 0.4,
      },
    ],
    legends: options.legend ? [{ stroke: "color", orient: "top-left" }] : [],
    marks: [
      {
        type: "group",
        from: {
          facet: { name: "series_points", data: "points", groupby: "series" },
        },
        marks: [
          {
            type: "line",
            from: { data: "series_points" },
            encode: {
              enter: {
                x: { scale: "x", field: "x" },
                y: { scale: "y", field: "y" },
                stroke: { scale: "color", field: "series" },
                strokeWidth: { value: 2 },
              },
            },
          },
          {
            type: "symbol",
            from: { data: "series_points" },
            encode: {
              enter: {
                x: { scale: "x", field: "x" },
                y: { scale: "y", field: "y" },
                fill: { scale: "color", field: "series" },
                size: { value: 40 },
              },
            },
          },
        ],
      },
    ],
  };
}

export const TIME_SERIES = {
  WALL: "Wall time (s)",
  SYSCALL: "Syscall time (s)",
} as const;

export const SYSCALL_COUNT_SERIES = "Syscall count";

/** Points arrive sorted by x; line marks join them in data order. */
export function timeChartData(points: readonly PlotPoint[]): ChartDatum[] {
  return [
    ...points.map((p) => ({
      x: p.recordSizeKiB,
      y: p.wallTimeSec,
      series: TIME_SERIES.WALL,
    })),
    ...points.map((p) => ({
      x: p.recordSizeKiB,
      y: p.syscallTimeSec,
      series: TIME_SERIES.SYSCALL,
    })),
  ];
}

export function syscallChartData(points: readonly PlotPoint[]): ChartDatum[] {
  return points.map((p) => ({
    x: p.recordSizeKiB,
    y: p.syscallCount,
    series: SYSCALL_COUNT_SERIES,
  }));
}

export function buildTimeChartSpec(points: readonly PlotPoint[]): vega.Spec {
  return lineChartSpec({
    title: "Wall time vs syscall time vs record size",
    xTitle: X_AXIS_TITLE,
    yTitle: "Seconds",
    points: timeChartData(points),
    legend: true,
  });
}

export function buildSyscallChartSpec(points: readonly PlotPoint[]): vega.Spec {
  return lineChartSpec({
    title: "Syscall count vs record size",
    xTitle: X_AXIS_TITLE,
    yTitle: "syscall_count",
    points: syscallChartData(points),
    legend: false,
  });
}

export async function renderSvg(spec: vega.Spec): Promise<string> {
  const view = new vega.View(vega.parse(spec), { renderer: "none" });
  try {
    return await view.toSVG();
  } finally {
    view.finalize();
  }
}

export interface RenderedCharts {
  timeChartPath: string;
  syscallChartPath: string;
}

export async function renderCharts(
  records: readonly ResultRecord[],
  outDir: string,
): Promise<RenderedCharts> {
  if (records.length === 0) {
    throw new ResultStoreError("Result file has no rows to plot");
  }

  const points = prepareSeries(records);
  const dir = resolve(outDir);
  mkdirSync(dir, { recursive: true });

  const timeChartPath = resolve(dir, TIME_CHART_FILE_NAME);
  writeFileSync(timeChartPath, await renderSvg(buildTimeChartSpec(points)), "utf-8");

  const syscallChartPath = resolve(dir, SYSCALL_CHART_FILE_NAME);
  writeFileSync(
    syscallChartPath,
    await renderSvg(buildSyscallChartSpec(points)),
    "utf-8",
  );

  logger.debug("Rendered charts", { points: points.length, dir });
  return { timeChartPath, syscallChartPath };
}
