/**
 * Oracle prompts
 */

/**
 * Fields requested from the extraction oracle, with their allowed values
 */
export const POLICY_FIELD_GUIDE = [
  "- program_name: name of the disclosure or bug bounty program",
  "- policy_url: \"self\" if this content is the policy, otherwise empty",
  "- contact_email: email address for reporting vulnerabilities",
  "- contact_url: URL of the reporting form, if one is provided",
  "- safe_harbor: full (no legal action), partial, or none",
  "- offers_bounty: yes, no, or partial",
  "- offers_swag: true if goodies are offered",
  "- disclosure_timeline_days: disclosure timeline in days (number), omit if not specified",
  "- public_disclosure: nda, discretionary, or co-ordinated",
  "- pgp_key: URL of the PGP key, or \"self\" if the key is in the content",
  "- hall_of_fame: hall of fame URL, or \"self\" if on the same page",
  "- preferred_languages: comma-separated language codes (en, de, fr, ...)",
  "- hiring: URL of security job openings",
  "- securitytxt_url: URL of the security.txt file, if referenced",
  "- launch_date: program launch date (YYYY-MM-DD)",
].join("\n");

export function buildRelevancePrompt(companyName: string, excerpt: string): string {
  return (
    `Analyze this content for ${companyName}:\n\n` +
    `${excerpt}\n\n` +
    "Return a confidence score (0-1) indicating how likely it contains a " +
    "vulnerability disclosure policy or bug bounty program.\n" +
    'Respond with a JSON object only: {"confidence": number}'
  );
}

export function buildExtractionPrompt(companyName: string, text: string): string {
  return (
    `Analyze the following content for the presence of a vulnerability disclosure policy for ${companyName}. ` +
    "If present, extract the following details:\n" +
    `${POLICY_FIELD_GUIDE}\n` +
    "Leave out any field that is not stated. Respond with a JSON object only.\n\n" +
    text
  );
}
