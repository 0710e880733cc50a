const isSet = (value: string | undefined): boolean => value !== undefined && value !== '';

/**
 * Lines printed by the setup check. Reports presence only, never values.
 */
export function checkEnvironment(env: NodeJS.ProcessEnv): string[] {
  return [
    'Test mode - verifying setup...',
    'Environment check:',
    `GROQ_API_KEY: ${isSet(env.GROQ_API_KEY) ? 'Set' : 'Not set'}`,
    `Email configured: ${isSet(env.TO_EMAIL) ? 'Yes' : 'No'}`,
  ];
}
