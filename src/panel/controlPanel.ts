/**
 * Quran Stream Bot — src/panel/controlPanel.ts
 * WHAT: The Discord message that shows what is playing, and its embed.
 * FLOWS:
 *  - postControlPanel(channel, host, store) → sends the first render → MessageControlPanel
 *  - MessageControlPanel.updatePanelStatus() → edits the same message with a fresh embed
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { EmbedBuilder, type MessageCreateOptions, type MessageEditOptions } from "discord.js";

import { logger } from "../lib/logger.js";
import { SAFE_ALLOWED_MENTIONS } from "../lib/constants.js";
import type { StateStore } from "../state/stateStore.js";
import type { ModeOwner, PanelSnapshot } from "../state/types.js";
import type { ControlPanel, PanelHost } from "./types.js";

const COLORS = {
  playing: 0x10b981, // green-500
  idle: 0x94a3b8, // slate-400
};

export interface PanelEmbedOptions {
  /** Number of audio files; shown as "n / total" when known */
  trackCount?: number;
}

/** The slice of a discord.js Message the panel touches */
export interface PanelMessage {
  id: string;
  edit(options: MessageEditOptions): Promise<unknown>;
}

/** The slice of a text channel needed to post the panel */
export interface PanelChannel {
  id: string;
  send(options: MessageCreateOptions): Promise<PanelMessage>;
}

function formatOwner(owner: ModeOwner): string {
  return owner.userId ? `ON - <@${owner.userId}>` : "OFF";
}

export function buildPanelEmbed(snapshot: PanelSnapshot, options: PanelEmbedOptions = {}): EmbedBuilder {
  const playing = snapshot.currentSongName !== null;
  const position = snapshot.currentSongIndex + 1;
  const track = options.trackCount ? `${position} / ${options.trackCount}` : `${position}`;

  const embed = new EmbedBuilder()
    .setTitle("📖 Quran Stream")
    .setDescription(playing ? `Now playing: **${snapshot.currentSongName}**` : "Nothing playing yet")
    .setColor(playing ? COLORS.playing : COLORS.idle)
    .addFields(
      { name: "Track", value: track, inline: true },
      { name: "Loop", value: formatOwner(snapshot.loop), inline: true },
      { name: "Shuffle", value: formatOwner(snapshot.shuffle), inline: true },
      { name: "Songs Played", value: String(snapshot.totalSongsPlayed), inline: true }
    )
    .setTimestamp();

  if (snapshot.showLastActivity && snapshot.lastChange) {
    const when = snapshot.lastActivityTime ? ` ${snapshot.lastActivityTime}` : "";
    embed.addFields({ name: "Last Activity", value: `${snapshot.lastChange}${when}`, inline: false });
  }

  return embed;
}

export class MessageControlPanel implements ControlPanel {
  constructor(
    private readonly message: PanelMessage,
    readonly host: PanelHost,
    private readonly store: StateStore,
    private readonly options: PanelEmbedOptions = {}
  ) {}

  get messageId(): string {
    return this.message.id;
  }

  async updatePanelStatus(): Promise<void> {
    const embed = buildPanelEmbed(this.store.getPanelSnapshot(), this.options);
    await this.message.edit({ embeds: [embed], allowedMentions: SAFE_ALLOWED_MENTIONS });
  }
}

export async function postControlPanel(
  channel: PanelChannel,
  host: PanelHost,
  store: StateStore,
  options: PanelEmbedOptions = {}
): Promise<MessageControlPanel> {
  const embed = buildPanelEmbed(store.getPanelSnapshot(), options);
  const message = await channel.send({ embeds: [embed], allowedMentions: SAFE_ALLOWED_MENTIONS });
  logger.info(
    { evt: "panel_posted", channelId: channel.id, messageId: message.id },
    "[panel] control panel posted"
  );
  return new MessageControlPanel(message, host, store, options);
}
