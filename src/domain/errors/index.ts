export {
  HarnessError,
  type HarnessErrorCode,
  InputFileNotFoundError,
  LaunchError,
  HealthTimeoutError,
  RequestFailedError,
  UnexpectedStatusError,
  EmptyResponseError,
  MissingFieldError,
  MalformedResponseError,
  PollTimeoutError,
} from './harness.errors';
