// Replace template placeholders like {{key}} with values from data object
// Returns original placeholder if key not found or value is null/undefined
// Substituted values cannot ping a whole server: @everyone and @here are defused
export const renderTemplate = (template: string, data?: Record<string, unknown>): string => {
  if (!data) {
    return template;
  }

  // \{\{ matches literal {{, \s* allows whitespace, ([^}\s]+) captures the key name
  return template.replace(/\{\{\s*([^}\s]+)\s*\}\}/g, (match, key: string) => {
    const value = data[key];
    if (value === undefined || value === null) {
      return match;
    }
    return defuseMentions(String(value));
  });
};

// A zero-width space after "@" keeps the text readable but breaks the mention
const defuseMentions = (text: string): string => text.replace(/@(everyone|here)/g, '@\u200b$1');
