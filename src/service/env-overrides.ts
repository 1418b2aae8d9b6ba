// Environment variables that take precedence over fleet.yaml fields.
const ENV_OVERRIDES: Record<string, string> = {
  FORKFLEET_ORGANIZATION: "organization",
  FORKFLEET_TEMPLATE_REPO: "template_repo",
  FORKFLEET_DEFAULT_BRANCH: "default_branch",
  FORKFLEET_REPOS_DIR: "repos_dir",
};

/**
 * Apply FORKFLEET_* overrides on top of the parsed config file.
 * Returns a new object; the input is left untouched.
 */
export function applyEnvOverrides(raw: Record<string, unknown>): Record<string, unknown> {
  const result = { ...raw };
  for (const [envKey, field] of Object.entries(ENV_OVERRIDES)) {
    const value = process.env[envKey];
    if (value) {
      result[field] = value;
      console.log(`[config] ${field} overridden by ${envKey}`);
    }
  }
  return result;
}

export function resolveGitHubToken(): string | undefined {
  return process.env.GITHUB_TOKEN || process.env.GH_TOKEN || undefined;
}
