import YAML from "yaml";
import {
  InvalidArgumentError,
  geomspace,
  isExtrapolationPolicy,
  linspace,
  loginterpolator,
  silentLogger,
  sqrtm1,
  type Extrapolation,
  type Logger,
} from "@num-core";
import type { AppConfig } from "./config/schema";

export interface SequenceArgs {
  start: number;
  stop: number;
  num?: number;
  endpoint?: boolean;
}

export interface Sqrtm1Args {
  x: number;
  a?: number;
}

export interface InterpArgs {
  x: string;
  y: string;
  at: string;
  method?: string;
  extrapolation?: string;
}

export function formatValue(v: number, precision: number): string {
  return String(Number(v.toPrecision(precision)));
}

function format(cfg: AppConfig, values: readonly number[]): string[] {
  return values.map((v) => formatValue(v, cfg.output.precision));
}

export function parseCsv(text: string, label: string): number[] {
  return text.split(",").map((part, i) => {
    const trimmed = part.trim();
    const v = Number(trimmed);
    if (trimmed === "" || Number.isNaN(v)) {
      throw new InvalidArgumentError(`--${label}: not a number at position ${i}: "${part}"`);
    }
    return v;
  });
}

export function parseExtrapolation(text: string): Extrapolation {
  if (isExtrapolationPolicy(text)) return text;
  const v = Number(text);
  if (text.trim() === "" || Number.isNaN(v)) {
    throw new InvalidArgumentError(
      `--extrapolation must be throw, flat, linear or a number, got "${text}"`
    );
  }
  return v;
}

export function runLinspace(cfg: AppConfig, args: SequenceArgs): string[] {
  const num = args.num ?? cfg.sequence.num;
  const endpoint = args.endpoint ?? cfg.sequence.endpoint;
  return format(cfg, linspace(args.start, args.stop, num, endpoint));
}

export function runGeomspace(cfg: AppConfig, args: SequenceArgs): string[] {
  const num = args.num ?? cfg.sequence.num;
  const endpoint = args.endpoint ?? cfg.sequence.endpoint;
  return format(cfg, geomspace(args.start, args.stop, num, endpoint));
}

export function runSqrtm1(cfg: AppConfig, args: Sqrtm1Args): string[] {
  const r = args.a === undefined ? sqrtm1(args.x) : sqrtm1(args.x, args.a);
  return format(cfg, [r]);
}

export function runInterp(cfg: AppConfig, args: InterpArgs, logger: Logger = silentLogger): string[] {
  const x = parseCsv(args.x, "x");
  const y = parseCsv(args.y, "y");
  const at = parseCsv(args.at, "at");
  const extrapolation =
    args.extrapolation === undefined
      ? cfg.interpolation.extrapolation
      : parseExtrapolation(args.extrapolation);

  const f = loginterpolator(x, y, {
    method: args.method ?? cfg.interpolation.method,
    extrapolation,
    logger,
  });
  logger.debug(`built ${f.method} interpolant over ${x.length} samples`);
  return format(cfg, at.map((q) => f(q)));
}

export function runConfig(cfg: AppConfig): string[] {
  return YAML.stringify(cfg).trimEnd().split("\n");
}
