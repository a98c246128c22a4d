import {
  ConnectivityError,
  IndexUnavailableError,
  StoreUnavailableError,
  describeError,
} from "../errors/catalog.js";

/** Run a store call, reporting any failure as StoreUnavailableError. */
export async function storeCall<T>(op: () => Promise<T>): Promise<T> {
  try {
    return await op();
  } catch (err) {
    if (err instanceof ConnectivityError) throw err;
    throw new StoreUnavailableError(describeError(err), { cause: err });
  }
}

/** Run an index call, reporting any failure as IndexUnavailableError. */
export async function indexCall<T>(op: () => Promise<T>): Promise<T> {
  try {
    return await op();
  } catch (err) {
    if (err instanceof ConnectivityError) throw err;
    throw new IndexUnavailableError(describeError(err), { cause: err });
  }
}
