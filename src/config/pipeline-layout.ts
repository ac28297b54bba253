/**
 * On-disk layout of the audited pipeline, relative to its root.
 *
 * EXTERNAL CONTRACT: these names are written by the ingest scripts, the
 * engine and the analytics runners. Renaming one here without renaming it
 * there turns a healthy pipeline into a degraded one.
 */

/** Folder spine. Missing any of these makes the pipeline unable to run. */
export const FOUNDATIONAL_DIRS = ['agents', 'data', 'logs', 'reports', 'scripts'] as const;

export const SENTIMENT_INDEX_FILE = 'data/sentiment_index.txt';
export const HEADLINES_FILE = 'data/headlines.csv';
export const FLOWS_FILE = 'data/flows_btc.json';
export const PRESSURE_FILE = 'data/pressure_btc.json';

export const FLOWS_REQUIRED_KEYS = ['funding', 'liq_skew', 'oi', 'price', 'ts_utc', 'volume_ratio'];
export const PRESSURE_REQUIRED_KEYS = ['components', 'pressure', 'source'];

/** Instruments with a bull/bear agent pair under agents/ */
export const INSTRUMENTS = ['BTC', 'ETH', 'SOL', 'SPX', 'NDX', 'DXY', 'GOLD', 'US10Y'] as const;

export const AGENTS_DIR = 'agents';
export const PHASE_VECTOR_LENGTH = 5;
export const ALIGNMENT_FIELDS = ['H4', 'H1'];
export const INDICATOR_FIELDS = ['rsi', 'macd', 'ema'];

export const ENGINE_SCRIPT = 'scripts/mirror_loop_v0_3_plus.py';
export const HEARTBEAT_FILE = 'logs/engine_heartbeat.txt';

export const RUN_LOG_CSV = 'logs/mirror_loop_unified_run.csv';
export const DECISIONS_LOG_JSONL = 'logs/mirror_loop_unified_decisions.jsonl';

/** Header contract of the tabular run log; column order is not part of it */
export const RUN_LOG_COLUMNS = [
  'timestamp_utc',
  'asset',
  'price',
  'C_eff',
  'phase_angle_deg',
  'volume_ratio',
  'signal',
  'size_band',
  'mode',
];

/** Fields of the latest decision record echoed into the log finding */
export const DECISION_PREVIEW_FIELDS = [
  'signal',
  'C_eff',
  'phase_angle_deg',
  'volume_ratio',
  'size_band',
  'trap_T',
  'herald_ok',
];

export const ANALYTICS_DIR = 'reports/unified';

export const SCHEDULER_ROLES = [
  { name: 'hourly', substrings: ['hourly', 'chain', 'loop'] },
  { name: 'eod', substrings: ['eod', 'daily'] },
];

export const LEASE_FILE = 'data/pipeline.lock';
