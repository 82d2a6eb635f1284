import type { ExclusionRule, Factor } from "../core/types.js";
import type { ScriptCategory } from "../remote/command-builder.js";

/** Shape of `gclab.config.json` as written by hand; omitted fields take defaults. */
export type GcLabConfigFile = {
  $schema?: string;
  experiment: {
    name: string;
    repetitions?: number;
    batch_size?: number;
    cooldown_ms?: number;
    seed?: number;
  };
  factors: Factor[];
  exclusions?: ExclusionRule[];
  remote?: {
    timeout_seconds?: number;
    transfer_timeout_seconds?: number;
    connect_timeout_seconds?: number;
    ssh_options?: string[];
    scripts?: Record<ScriptCategory, string>;
    subjects?: Record<string, ScriptCategory>;
    default_category?: ScriptCategory;
  };
  output?: {
    runs_dir?: string;
  };
};

export type GcLabResolvedConfig = {
  experiment: {
    name: string;
    repetitions: number;
    batch_size: number;
    cooldown_ms: number;
    seed: number;
  };
  factors: Factor[];
  exclusions: ExclusionRule[];
  remote: {
    timeout_seconds: number;
    transfer_timeout_seconds: number;
    connect_timeout_seconds: number;
    ssh_options: string[];
    scripts: Record<ScriptCategory, string>;
    subjects: Record<string, ScriptCategory>;
    default_category: ScriptCategory;
  };
  output: {
    runs_dir: string;
  };
};

/** Variables read from the environment (or `.env`). */
export type DutEnvironment = {
  DUT_USER?: string;
  DUT_HOST?: string;
  DUT_EXPERIMENT_DIR?: string;
  DUT_TIMEOUT_SECONDS?: string;
  ENERGY_MOCK_MODE?: string;
};
