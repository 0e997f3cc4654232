import { stat } from "node:fs/promises";

import { exists, isNotFound } from "@/utils/helper";

import type { FileProbe } from "./FileProbe";

export class FileProbeDefault implements FileProbe {
  exists(filePath: string) {
    return exists(filePath);
  }

  async isDirectory(filePath: string) {
    try {
      return (await stat(filePath)).isDirectory();
    } catch (error) {
      if (isNotFound(error)) return false;
      throw error;
    }
  }
}
