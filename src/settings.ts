import { readFileSync } from "fs";
import { BridgeSettings, GroupConfiguration } from "./types";
import { isRecord } from "./utils";

export const DEFAULT_SETTINGS: BridgeSettings = {
  new_incident_name: "%s is experiencing issues",
  new_incident_message: "We are currently investigating this issue.",
  resolved_incident_message: "The issue has been resolved.",
  cachet_per_page_param: 50,
  groups_configuration: [],
};

// Merge a parsed settings document over the defaults, ignoring keys of the wrong type
export function parseSettings(raw: unknown): BridgeSettings {
  if (!isRecord(raw)) {
    throw new Error("Settings document must be a JSON object");
  }

  const pickString = (key: keyof BridgeSettings, fallback: string): string => {
    const value = raw[key];
    return typeof value === "string" && value.length > 0 ? value : fallback;
  };

  const perPage = raw.cachet_per_page_param;

  return {
    new_incident_name: pickString("new_incident_name", DEFAULT_SETTINGS.new_incident_name),
    new_incident_message: pickString("new_incident_message", DEFAULT_SETTINGS.new_incident_message),
    resolved_incident_message: pickString("resolved_incident_message", DEFAULT_SETTINGS.resolved_incident_message),
    cachet_per_page_param:
      typeof perPage === "number" && perPage > 0 ? perPage : DEFAULT_SETTINGS.cachet_per_page_param,
    groups_configuration: parseGroups(raw.groups_configuration),
  };
}

function parseGroups(raw: unknown): GroupConfiguration[] {
  if (!Array.isArray(raw)) return [];

  const groups: GroupConfiguration[] = [];
  for (const entry of raw) {
    if (!isRecord(entry)) continue;
    const group = entry.status_page_group;
    const components = entry.status_page_components;
    if (typeof group !== "string" || !group || !Array.isArray(components)) {
      console.warn("Skipping invalid groups_configuration entry", { entry });
      continue;
    }
    groups.push({
      status_page_group: group,
      status_page_components: components.filter((c): c is string => typeof c === "string" && c.length > 0),
    });
  }
  return groups;
}

export function loadSettings(filePath: string): BridgeSettings {
  let contents: string;
  try {
    contents = readFileSync(filePath, "utf8");
  } catch (error) {
    console.warn(`Settings file ${filePath} not readable, using defaults`, {
      error: error instanceof Error ? error.message : String(error),
    });
    return { ...DEFAULT_SETTINGS };
  }

  const settings = parseSettings(JSON.parse(contents));
  console.log(`Loaded settings from ${filePath}`, {
    groups: settings.groups_configuration.length,
  });
  return settings;
}

// Map each service name to the group it is configured under
export function componentToGroupMap(settings: BridgeSettings): Map<string, string> {
  const map = new Map<string, string>();
  for (const entry of settings.groups_configuration) {
    for (const component of entry.status_page_components) {
      map.set(component, entry.status_page_group);
    }
  }
  return map;
}

export function incidentTitle(settings: BridgeSettings, serviceName: string): string {
  return settings.new_incident_name.replace("%s", serviceName);
}
