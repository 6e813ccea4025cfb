import { serialError, SerialErrorRecord } from "../../errors";

/** Runs `run` and returns the record of the serial error it throws. */
export const recordOf = (run: () => unknown): SerialErrorRecord => {
  try {
    run();
  } catch (error) {
    if (serialError.is(error)) {
      return error.data;
    }
    throw error;
  }
  throw new Error("expected a serial error");
};
