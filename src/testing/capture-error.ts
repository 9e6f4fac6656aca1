export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  }
  catch (error) {
    return error;
  }
  throw new Error('expected the call to throw');
}
