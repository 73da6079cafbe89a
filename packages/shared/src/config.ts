export interface ConfigTemplateAnswers {
  name: string;
  manifest: string;
  specialists?: string[];
  syncCommand?: string[] | null;
}

export interface ConfigDefaults {
  project: { name: string; manifest: string };
  specialists: string[];
  models: { specialist: string; judge: string; [role: string]: string };
  round: {
    specialist_timeout_ms: number;
    judge_timeout_ms: number;
    max_retries: number;
    backoff_base_ms: number;
    backoff_max_ms: number;
  };
  sync: { command: string[] | null };
  lock: { lease_seconds: number };
}

export const DEFAULT_CONFIG: ConfigDefaults = {
  project: {
    name: '',
    manifest: 'pyproject.toml',
  },
  specialists: ['configuration', 'workflow'],
  models: {
    specialist: 'sonnet',
    judge: 'sonnet',
  },
  round: {
    specialist_timeout_ms: 120_000,
    judge_timeout_ms: 60_000,
    max_retries: 2,
    backoff_base_ms: 1_000,
    backoff_max_ms: 8_000,
  },
  sync: {
    command: null,
  },
  lock: {
    lease_seconds: 30,
  },
};

export function configTemplate(answers: ConfigTemplateAnswers): string {
  return JSON.stringify({
    project: {
      name: answers.name,
      manifest: answers.manifest,
    },
    specialists: answers.specialists ?? [...DEFAULT_CONFIG.specialists],
    models: {
      specialist: 'sonnet',
      judge: 'sonnet',
    },
    round: { ...DEFAULT_CONFIG.round },
    sync: {
      command: answers.syncCommand ?? null,
    },
    lock: { ...DEFAULT_CONFIG.lock },
  }, null, 2);
}
