process.env.LOG_LEVEL = "silent";
process.env.LOG_PRETTY = "false";
