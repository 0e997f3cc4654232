export const DEFAULT_MERGE_OUTPUT_FILE_NAME = "merged.pdf";

export const MAX_NUM_OF_RENAME_ATTEMPTS = 20;
