export type ModifierKey = "Control" | "Meta" | "Super" | "Alt" | "Shift";

const MODIFIER_ALIASES: Record<string, ModifierKey> = {
  ctrl: "Control",
  control: "Control",
  cmd: "Meta",
  command: "Meta",
  meta: "Meta",
  super: "Super",
  win: "Super",
  windows: "Super",
  alt: "Alt",
  option: "Alt",
  opt: "Alt",
  shift: "Shift",
};

export interface KeyCombo {
  key: string;
  modifiers: ModifierKey[];
}

export function toModifierKey(name: string): ModifierKey | undefined {
  return MODIFIER_ALIASES[name.trim().toLowerCase()];
}

/**
 * Splits a descriptor such as "Cmd+Shift+T" into its primary key and
 * modifiers. A trailing "+" is the plus key itself ("Ctrl++").
 */
export function parseKeyDescriptor(descriptor: string): KeyCombo {
  const trimmed = descriptor.trim();
  if (!trimmed) {
    throw new Error("Key descriptor is empty");
  }

  const segments = trimmed.split(/\+(?!$)/).map((segment) => segment.trim());
  if (segments.some((segment) => segment.length === 0)) {
    throw new Error(`Key descriptor '${descriptor}' has an empty segment`);
  }

  const key = segments[segments.length - 1];
  const modifiers: ModifierKey[] = [];
  for (const segment of segments.slice(0, -1)) {
    const modifier = toModifierKey(segment);
    if (!modifier) {
      throw new Error(
        `Unknown modifier '${segment}' in key descriptor '${descriptor}'`,
      );
    }
    if (!modifiers.includes(modifier)) {
      modifiers.push(modifier);
    }
  }

  return { key, modifiers };
}
