import type { LinkPicker } from "./types.js";

export function pickRandom(random: () => number = Math.random): LinkPicker {
  return (links) => {
    if (links.length === 0) return undefined;
    const index = Math.min(links.length - 1, Math.floor(random() * links.length));
    return links[index];
  };
}

export function pickAt(index: number): LinkPicker {
  return (links) => (links.length === 0 ? undefined : links[Math.abs(index) % links.length]);
}
