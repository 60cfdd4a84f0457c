/**
 * Stack trace capture for pooled column errors.
 *
 * Every error class calls `captureStackTrace(this, Class)` so the reported
 * stack starts at the operation that raised it rather than inside the error
 * constructors.
 */

interface V8ErrorConstructor {
  captureStackTrace(targetObject: object, constructorOpt?: Function): void;
}

function hasV8CaptureStackTrace(
  errorConstructor: typeof Error
): errorConstructor is typeof Error & V8ErrorConstructor {
  return typeof (errorConstructor as unknown as V8ErrorConstructor).captureStackTrace === 'function';
}

/**
 * Capture a stack trace on `error`, omitting `constructorOpt` and every frame
 * above it. Outside V8 the stack populated by `Error` itself is kept.
 */
export function captureStackTrace(
  error: Error,
  constructorOpt?: Function
): void {
  if (hasV8CaptureStackTrace(Error)) {
    Error.captureStackTrace(error, constructorOpt);
  }
}
