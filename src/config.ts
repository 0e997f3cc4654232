import { Type as t } from "@sinclair/typebox";

import { buildConfigFactoryEnv, envInteger } from "~shared/ConfigFactory";

import {
  DEFAULT_MERGE_OUTPUT_FILE_NAME,
  MAX_NUM_OF_RENAME_ATTEMPTS,
} from "@/constants";

const getEnvConfig = buildConfigFactoryEnv(
  t.Object({
    PDF_MERGE_MAX_RENAME_ATTEMPTS: t.Optional(envInteger({ minimum: 1 })),
    PDF_MERGE_DEFAULT_FILE_NAME: t.Optional(t.String({ minLength: 1 })),
  })
);

export type MergeConfig = {
  maxRenameAttempts: number;
  defaultFileName: string;
};

export function getMergeConfig(): MergeConfig {
  const env = getEnvConfig();
  return {
    maxRenameAttempts:
      env.PDF_MERGE_MAX_RENAME_ATTEMPTS ?? MAX_NUM_OF_RENAME_ATTEMPTS,
    defaultFileName:
      env.PDF_MERGE_DEFAULT_FILE_NAME ?? DEFAULT_MERGE_OUTPUT_FILE_NAME,
  };
}
