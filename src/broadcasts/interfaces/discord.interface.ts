export interface DiscordEmbedField {
  name: string;
  value: string;
  inline?: boolean;
}

/**
 * Subset of the Discord embed object the tracker renders.
 * Docs: https://discord.com/developers/docs/resources/message#embed-object
 */
export interface DiscordEmbed {
  title?: string;
  description?: string;
  url?: string;
  color?: number;
  timestamp?: string;
  image?: { url: string };
  thumbnail?: { url: string };
  footer?: { text: string; icon_url?: string };
  fields?: DiscordEmbedField[];
}

export interface DiscordMessagePayload {
  content?: string;
  embeds?: DiscordEmbed[];
}

export interface DiscordMessage {
  id: string;
  channel_id: string;
  content: string;
}
