const DIRENVRC_HELPER = `# devports helper function for direnv
# Add to ~/.config/direnv/direnvrc

use_devports() {
    eval "$(devports export --auto)"
}
`;

/**
 * Line to add to a project's .envrc
 */
export function envrcSnippet(): string {
  return 'eval "$(devports export --auto)"\n';
}

export function direnvrcHelper(): string {
  return DIRENVRC_HELPER;
}
