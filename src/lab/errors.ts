export class AppNotFoundError extends Error {
  readonly app: string;

  constructor(app: string) {
    super(`Application '${app}' not found in manifest`);
    this.name = "AppNotFoundError";
    this.app = app;
  }
}

export class AppNotInstalledError extends Error {
  readonly app: string;

  constructor(app: string) {
    super(`Application '${app}' is not installed`);
    this.name = "AppNotInstalledError";
    this.app = app;
  }
}

export class AppAlreadyRunningError extends Error {
  readonly app: string;

  constructor(app: string) {
    super(`Application '${app}' is already running`);
    this.name = "AppAlreadyRunningError";
    this.app = app;
  }
}

export class AppNotRunningError extends Error {
  readonly app: string;

  constructor(app: string) {
    super(`Application '${app}' is not running`);
    this.name = "AppNotRunningError";
    this.app = app;
  }
}

export class AppNotRebuildableError extends Error {
  readonly app: string;

  constructor(app: string) {
    super(`Application '${app}' is a prebuilt package and cannot be rebuilt`);
    this.name = "AppNotRebuildableError";
    this.app = app;
  }
}
