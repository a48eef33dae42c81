export default {
  test: {
    environment: "node",
    include: ["tests/**/*.test.ts"],
    // dotenv keeps variables already set, so a local .env
    // does not leak into tests
    env: { LOG_LEVEL: "silent", GEMINI_API_KEY: "" },
  },
};
