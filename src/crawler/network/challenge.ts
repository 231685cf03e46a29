const CHALLENGE_KEYWORDS = ['captcha', 'are you a robot', "verify you're human", 'recaptcha'];

/** Returns the first challenge keyword found in the leading `scanChars` of the content. */
export function detectChallenge(content: string, scanChars: number): string | undefined {
  const head = content.slice(0, scanChars).toLowerCase();
  return CHALLENGE_KEYWORDS.find((keyword) => head.includes(keyword));
}
