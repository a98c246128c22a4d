export {
  ServiceError,
  ValidationError,
  UnauthorizedError,
  DocumentNotFoundError,
  ContentTooLargeError,
  IndexWriteError,
  ConnectivityError,
  StoreUnavailableError,
  IndexUnavailableError,
  describeError,
} from "./catalog.js";
