import * as dotenv from "dotenv";

// Load environment variables
dotenv.config();

export const LOG_LEVELS = ["error", "warn", "info", "debug"] as const;

export interface AppConfig {
  storage: {
    filePath: string;
  };
  logging: {
    level: string;
    file?: string;
  };
  environment: string;
}

export class Config {
  private static instance: Config;
  private config: AppConfig;

  private constructor(private readonly env: NodeJS.ProcessEnv) {
    this.config = this.loadConfig();
  }

  public static getInstance(): Config {
    if (!Config.instance) {
      Config.instance = new Config(process.env);
      Config.instance.validate();
    }
    return Config.instance;
  }

  /**
   * Build a configuration from an explicit environment instead of `process.env`.
   * The result is not cached.
   */
  public static fromEnvironment(env: NodeJS.ProcessEnv): Config {
    return new Config(env);
  }

  public get(): AppConfig {
    return this.config;
  }

  private loadConfig(): AppConfig {
    return {
      storage: {
        filePath: this.getEnvVar("STORAGE_FILE", "file.json"),
      },
      logging: {
        level: this.getEnvVar("LOG_LEVEL", "info"),
        file: this.env.LOG_FILE,
      },
      environment: this.getEnvVar("NODE_ENV", "development"),
    };
  }

  private getEnvVar(key: string, defaultValue: string): string {
    const value = this.env[key];
    if (value === undefined) {
      return defaultValue;
    }
    return value;
  }

  public validate(): void {
    const errors: string[] = [];

    if (!this.config.storage.filePath.trim()) {
      errors.push("STORAGE_FILE must not be empty");
    }

    if (!LOG_LEVELS.some((level) => level === this.config.logging.level)) {
      errors.push(`LOG_LEVEL must be one of ${LOG_LEVELS.join(", ")}`);
    }

    if (errors.length > 0) {
      throw new Error(`Configuration validation failed: ${errors.join(", ")}`);
    }
  }
}
