import Debug from "debug";

//logger
const globalContext = "scoreboard";

export const globalLogger = Debug(globalContext);

export class Logger {
  private logInfo: Debug.Debugger;
  private logError: Debug.Debugger;

  constructor(loggingContext: string) {
    this.logInfo = globalLogger.extend(loggingContext + " [INFO]");
    this.logError = globalLogger.extend(loggingContext + " [ERROR]");

    this.logInfo.log = this.log.bind(this);

    this.logError.log = this.logFailure.bind(this);
  }

  private log(message: string, ...args: unknown[]) {
    console.info(message, ...args);
  }

  private logFailure(message: string, ...args: unknown[]) {
    console.error(message, ...args);
  }

  public info = (arg: unknown, ...args: unknown[]): void => {
    this.logInfo(arg, ...args);
  };

  public error = (arg: unknown, ...args: unknown[]): void => {
    this.logError(arg, ...args);
  };
}
