export interface Logger {
  info(message: string): void;
  error(message: string, err?: unknown): void;
}

export const consoleLogger: Logger = {
  info(message) {
    console.log(message);
  },
  error(message, err) {
    if (err === undefined) {
      console.error(message);
    } else {
      console.error(message, err);
    }
  },
};
