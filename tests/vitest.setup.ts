// Seed the environment before any module reads the configuration.
process.env.NODE_ENV = process.env.NODE_ENV || "test";
process.env.S3_DEFAULT_REGION = process.env.S3_DEFAULT_REGION || "us-east-1";
process.env.S3_FORCE_PATH_STYLE = process.env.S3_FORCE_PATH_STYLE || "true";
process.env.PORT = process.env.PORT || "3000";
delete process.env.SENTRY_DSN;
