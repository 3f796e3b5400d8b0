/**
 * @fileoverview Step-by-step guidance for obtaining and storing an API key
 * @module features/guide/setup-guide
 */

// =============================================================================
// TYPES
// =============================================================================

/**
 * One section of the setup guide.
 */
export interface GuideSection {
  id: 'create-key' | 'secrets' | 'environment' | 'first-request' | 'rest' | 'safety';
  title: string;
  description: string;
  /** Step-by-step instructions */
  steps: string[];
  /** Additional tips or notes */
  tips?: string[];
  externalLinks?: Array<{ title: string; url: string }>;
}

/**
 * Values substituted into the guide.
 */
export interface GuideOptions {
  secretName: string;
  envVar: string;
  model: string;
  configDir: string;
  baseUrl: string;
  apiVersion: string;
}

export const API_KEY_URL = 'https://aistudio.google.com/app/apikey';

// =============================================================================
// GUIDE CONTENT
// =============================================================================

/**
 * Builds the setup guide for the current configuration.
 */
export function buildSetupGuide(options: GuideOptions): GuideSection[] {
  const endpoint = `${options.baseUrl.replace(/\/+$/, '')}/${options.apiVersion}/models/${options.model}:generateContent`;

  return [
    {
      id: 'create-key',
      title: 'Create an API key',
      description: 'Requests to the Gemini API are authenticated with an API key tied to a Google Cloud project.',
      steps: [
        `Open ${API_KEY_URL} and sign in with your Google account.`,
        'Choose "Create API key" and pick (or create) a project.',
        'Copy the key. Treat it like a password.',
      ],
      externalLinks: [{ title: 'Google AI Studio API keys', url: API_KEY_URL }],
    },
    {
      id: 'secrets',
      title: 'Option 1: store the key in the secrets manager',
      description: `Secrets are kept in ${options.configDir}/secrets.yaml, readable only by you.`,
      steps: [
        `Paste the key when prompted: gemini-quickstart secrets set ${options.secretName} --stdin`,
        `Check that access is granted: gemini-quickstart secrets list`,
        `If it shows "revoked", run: gemini-quickstart secrets grant ${options.secretName}`,
      ],
      tips: [
        `Revoke access without deleting the key: gemini-quickstart secrets revoke ${options.secretName}`,
      ],
    },
    {
      id: 'environment',
      title: 'Option 2: use an environment variable',
      description: `The key can come from ${options.envVar}, set in your shell or in a .env file.`,
      steps: [
        `export ${options.envVar}=<your key>`,
        `or add the line ${options.envVar}=<your key> to a .env file in your working directory`,
      ],
      tips: ['Keep the export out of shell history by reading it from a file you do not commit.'],
    },
    {
      id: 'first-request',
      title: 'Send your first request',
      description: `The client is configured with the key and sends the prompt to ${options.model}.`,
      steps: [
        'gemini-quickstart status            # shows where the key is read from',
        'gemini-quickstart generate "Please give me python code to sort a list."',
        'gemini-quickstart models            # other models you can pass with --model',
      ],
    },
    {
      id: 'rest',
      title: 'Calling the REST API directly',
      description: 'The same request without any client library; the key travels as the key query parameter.',
      steps: [
        `curl "${endpoint}?key=$${options.envVar}" \\`,
        `  -H 'Content-Type: application/json' -X POST \\`,
        `  -d '{"contents": [{"parts": [{"text": "Please give me python code to sort a list."}]}]}'`,
      ],
      tips: ['gemini-quickstart generate --transport rest makes this exact call.'],
    },
    {
      id: 'safety',
      title: 'Keep the key out of version control',
      description: 'Anyone holding the key can spend your quota.',
      steps: [
        'Never paste the key into source files or notebooks you share.',
        'Add .env to .gitignore; gemini-quickstart status warns when it is missing.',
        `If a key leaks, delete it at ${API_KEY_URL} and create a new one.`,
      ],
    },
  ];
}

// =============================================================================
// FORMATTING
// =============================================================================

/**
 * Formats guide sections as numbered plain text.
 */
export function formatSetupGuide(sections: GuideSection[]): string {
  const blocks = sections.map((section, index) => {
    const lines = [`${index + 1}. ${section.title}`, `   ${section.description}`];
    for (const step of section.steps) {
      lines.push(`     ${step}`);
    }
    for (const tip of section.tips ?? []) {
      lines.push(`   Tip: ${tip}`);
    }
    for (const link of section.externalLinks ?? []) {
      lines.push(`   ${link.title}: ${link.url}`);
    }
    return lines.join('\n');
  });
  return `${blocks.join('\n\n')}\n`;
}
