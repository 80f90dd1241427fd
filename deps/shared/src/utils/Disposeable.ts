export type MaybeAsyncDisposable = Partial<AsyncDisposable & Disposable>;

/**
 * 釋放資源；同時支援 asyncDispose 與 dispose。
 */
export async function dispose(target: MaybeAsyncDisposable) {
  if (target[Symbol.asyncDispose]) {
    await target[Symbol.asyncDispose]();
    return;
  }
  target[Symbol.dispose]?.();
}
