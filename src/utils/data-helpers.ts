//constants
export const DB_NAME = "cricket_db";
export const PARTICIPANTS = "students_performance"; //collection name for participant records

export const ROLL_NUMBER_PATTERN = /^\d{10}$/;

export const HIT_RECORDED_MESSAGE = "Shot recorded successfully";
export const INVALID_INPUT_MESSAGE = "Invalid input";
export const INVALID_ROLL_NUMBER_MESSAGE = "Roll number must be exactly 10 digits";
export const NAME_REQUIRED_MESSAGE = "Name is required";
export const RATE_LIMITED_MESSAGE = "Too many requests. Please wait a few seconds.";
export const UPDATE_FAILED_MESSAGE = "Error updating score";
export const FETCH_FAILED_MESSAGE = "Error fetching scoreboard";

export const isNullOrUndefined = (
  value: unknown
): value is null | undefined => {
  return value === null || value === undefined;
};

export type FaultFormat = "json" | "text";

//base for every fault that maps onto an http response
export class ServiceFault extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly format: FaultFormat
  ) {
    super(message);
    this.name = "ServiceFault";
  }
}

export class ClientInputFault extends ServiceFault {
  constructor(message: string, format: FaultFormat = "json") {
    super(message, 400, format);
    this.name = "ClientInputFault";
  }
}

export class RateLimitFault extends ServiceFault {
  constructor(public readonly rollNumber: string) {
    super(RATE_LIMITED_MESSAGE, 429, "json");
    this.name = "RateLimitFault";
  }
}

//message is what the client sees, storeError is only logged
export class StoreFault extends ServiceFault {
  constructor(message: string, public readonly storeError: unknown) {
    super(message, 500, "text");
    this.name = "StoreFault";
  }
}

export class StoreTimeoutError extends Error {
  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = "StoreTimeoutError";
  }
}

export class StartupFault extends Error {
  constructor(message: string) {
    super(message);
    this.name = "StartupFault";
  }
}

export const withTimeout = <T>(
  operation: Promise<T>,
  timeoutMs: number,
  label: string
): Promise<T> => {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new StoreTimeoutError(label, timeoutMs)),
      timeoutMs
    );
  });

  return Promise.race([operation, timeout]).finally(() => {
    clearTimeout(timer);
  });
};
