export const ICONS = {
  chevronUp: "⌃",
  chevronDown: "⌄",
  creditCard: "💳",
  location: "📍",
  login: "🔑"
} as const;

export type IconIdentifier = keyof typeof ICONS;
