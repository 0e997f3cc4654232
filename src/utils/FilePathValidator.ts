import { type Result, err, ok } from "~shared/utils/Result";

export const MAX_PATH_LENGTH = 4096;
export const MAX_COMPONENT_LENGTH = 255;

export type InvalidFilePath = {
  type: "EMPTY" | "INVALID_CHARACTER" | "TOO_LONG" | "COMPONENT_TOO_LONG";
  path: string;
  message: string;
};

const controlChars = /[\u0000-\u001f\u007f]/;
const win32Reserved = /[<>:"|?*]/;

/**
 * 只檢查語法，不檢查檔案是否存在。
 */
export function validateFilePath(
  filePath: string,
  platform: NodeJS.Platform = process.platform
): Result<string, InvalidFilePath> {
  const invalid = (type: InvalidFilePath["type"], message: string) =>
    err<InvalidFilePath>({ type, path: filePath, message });

  if (filePath.length === 0) {
    return invalid("EMPTY", "路徑不可為空");
  }
  if (controlChars.test(filePath)) {
    return invalid("INVALID_CHARACTER", `路徑含有控制字元: ${JSON.stringify(filePath)}`);
  }
  if (filePath.length > MAX_PATH_LENGTH) {
    return invalid("TOO_LONG", `路徑長度超過 ${MAX_PATH_LENGTH} 字元`);
  }

  const separator = platform === "win32" ? /[\\/]/ : /\//;
  const components = filePath.split(separator);
  if (components.some((c) => c.length > MAX_COMPONENT_LENGTH)) {
    return invalid(
      "COMPONENT_TOO_LONG",
      `路徑中的名稱長度超過 ${MAX_COMPONENT_LENGTH} 字元`
    );
  }

  if (platform === "win32") {
    // C:\ 的冒號是合法的
    const withoutDrive = filePath.replace(/^[a-zA-Z]:/, "");
    if (win32Reserved.test(withoutDrive)) {
      return invalid("INVALID_CHARACTER", `路徑含有 Windows 保留字元: ${filePath}`);
    }
  }

  return ok(filePath);
}
