/**
 * 依序釋放資源，全部釋放後若有錯誤才拋出第一個。
 */
export async function dispose(...targets: AsyncDisposable[]) {
  const errors: unknown[] = [];
  for (const target of targets) {
    try {
      await target[Symbol.asyncDispose]();
    } catch (error) {
      errors.push(error);
    }
  }
  if (errors.length > 0) throw errors[0];
}
