import {
  voyageStops,
  setsSailAt,
  type VoyageRoute,
  type VoyageSlot,
  type GateSlot,
  type JumboCactpotRegion,
} from '../domain/index.js';

/**
 * Message bodies in the shape Discord's webhook execute endpoint accepts.
 */
export interface EmbedField {
  name: string;
  value: string;
  inline?: boolean;
}

export interface Embed {
  title: string;
  description?: string;
  url?: string;
  color?: number;
  fields?: EmbedField[];
  image?: { url: string };
  thumbnail?: { url: string };
  footer?: { text: string };
  /** ISO-8601 */
  timestamp?: string;
}

export interface NotificationPayload {
  content?: string;
  embeds: Embed[];
}

export interface FashionReport {
  week: number;
  title: string;
  url: string;
  imageUrl: string | null;
  publishedAt: Date;
}

const COLORS = {
  reset: 0x5865f2,
  fashion: 0xeb459e,
  fishing: 0x3498db,
  cactpot: 0xf1c40f,
  gate: 0xe67e22,
  tournament: 0x1abc9c,
} as const;

const DAILY_CONTENT = ['Beast Tribe', 'Duty Roulettes', 'Hunt Marks', 'Mini Cactpot', 'Levequests'];
const WEEKLY_CONTENT = [
  'Custom Delivery',
  'Doman Enclave',
  'Wondrous Tails',
  'Hunt Marks',
  'Raid Lockouts',
  'Challenge Log',
  'Masked Carnivale',
  'Squadron Priority Missions',
  'Currency Limits',
];

const REGION_LABELS: Record<JumboCactpotRegion, string> = {
  na: 'North America',
  eu: 'Europe',
  jp: 'Japan',
  oce: 'Oceania',
};

const ROUTE_LABELS: Record<VoyageRoute, string> = {
  indigo: 'Indigo Route',
  ruby: 'Ruby Route',
};

/** Discord timestamp markup, rendered in each reader's own timezone. */
export function discordTimestamp(date: Date, style: 'F' | 'R' | 't' = 'F'): string {
  return `<t:${Math.floor(date.getTime() / 1000)}:${style}>`;
}

function resetPayload(title: string, resetAt: Date, content: readonly string[], color: number): NotificationPayload {
  return {
    embeds: [{
      title,
      description: `Resets at ${discordTimestamp(resetAt)} (${discordTimestamp(resetAt, 'R')})\n\n${content.join('\n')}`,
      color,
      timestamp: resetAt.toISOString(),
    }],
  };
}

export function dailyResetPayload(resetAt: Date): NotificationPayload {
  return resetPayload('Daily Reset Details!', resetAt, DAILY_CONTENT, COLORS.reset);
}

export function weeklyResetPayload(resetAt: Date): NotificationPayload {
  return resetPayload('Weekly Reset Details!', resetAt, WEEKLY_CONTENT, COLORS.reset);
}

export function fashionReportPayload(report: FashionReport, closesAt: Date): NotificationPayload {
  const embed: Embed = {
    title: report.title,
    url: report.url,
    description: `Judging closes ${discordTimestamp(closesAt)} (${discordTimestamp(closesAt, 'R')})`,
    color: COLORS.fashion,
    footer: { text: `Week ${report.week}` },
    timestamp: report.publishedAt.toISOString(),
  };
  if (report.imageUrl !== null) {
    embed.image = { url: report.imageUrl };
  }
  return { embeds: [embed] };
}

export function fashionReportUnavailablePayload(week: number, reason: string): NotificationPayload {
  return {
    embeds: [{
      title: `Fashion Report (Week ${week})`,
      description: `Judging is open, but this week's report is not available yet: ${reason}`,
      color: COLORS.fashion,
    }],
  };
}

export function oceanFishingPayload(slots: Record<VoyageRoute, VoyageSlot>): NotificationPayload {
  const indigo = slots.indigo;
  const sailsAt = setsSailAt(indigo);

  const fields: EmbedField[] = (['indigo', 'ruby'] as const).map((route) => {
    const slot = slots[route];
    const stops = voyageStops(slot)
      .map((stop, i) => `${i + 1}. ${stop.stop} (${stop.time})`)
      .join('\n');
    return { name: `${ROUTE_LABELS[route]}: ${slot.destination} (${slot.timeOfDay})`, value: stops, inline: true };
  });

  return {
    embeds: [{
      title: 'Ocean Fishing registration is open!',
      description: `The boat sets sail ${discordTimestamp(sailsAt, 't')} (${discordTimestamp(sailsAt, 'R')})`,
      color: COLORS.fishing,
      fields,
      timestamp: indigo.startsAt.toISOString(),
    }],
  };
}

export function jumboCactpotPayload(region: JumboCactpotRegion, drawingAt: Date): NotificationPayload {
  return {
    embeds: [{
      title: `Jumbo Cactpot (${REGION_LABELS[region]})`,
      description: `The drawing is ${discordTimestamp(drawingAt)} (${discordTimestamp(drawingAt, 'R')}). Buy your tickets!`,
      color: COLORS.cactpot,
      timestamp: drawingAt.toISOString(),
    }],
  };
}

export function gatePayload(slot: GateSlot): NotificationPayload {
  return {
    embeds: [{
      title: `GATE at :${String(slot.timeOfDay).padStart(2, '0')}`,
      description: 'One of these GATEs is starting now:',
      color: COLORS.gate,
      fields: slot.destination.map((gate) => ({ name: gate.name, value: gate.url })),
      timestamp: slot.startsAt.toISOString(),
    }],
  };
}

export function openTournamentPayload(startsAt: Date): NotificationPayload {
  return {
    embeds: [{
      title: 'Triple Triad Open Tournament',
      description: `Sign-ups for the open tournament begin ${discordTimestamp(startsAt, 't')}.`,
      color: COLORS.tournament,
      timestamp: startsAt.toISOString(),
    }],
  };
}
