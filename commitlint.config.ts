export default {
  extends: ["@commitlint/config-conventional"],
  rules: {
    // Scopes follow the package and module layout
    "scope-enum": [2, "always", ["exporter", "shared", "metrics", "db", "routes", "schema", "deps", "ci"]],
    "scope-empty": [0], // scope is optional
  },
};
