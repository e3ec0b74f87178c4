/**
 * Debug Mode Registry
 *
 * Per-component log level override management.
 *
 * Components register themselves at module load (e.g. "soap-transport",
 * "soap-batch"). Operators can then selectively enable DEBUG/TRACE logging
 * for one component without flooding the rest of the output.
 */

import { LogLevel, parseLogLevel, shouldDisplayLogLevel } from './LogLevel.js';

interface ComponentRegistration {
  name: string;
  description: string;
  levelOverride?: LogLevel;
}

export interface RegisteredComponent {
  name: string;
  description: string;
  effectiveLevel: LogLevel;
  hasOverride: boolean;
}

const registry = new Map<string, ComponentRegistration>();

/**
 * Register a loggable component.
 * An existing override survives re-registration unless a new default is given.
 */
export function registerComponent(name: string, description: string, defaultLevel?: LogLevel): void {
  const existing = registry.get(name);
  registry.set(name, {
    name,
    description,
    levelOverride: defaultLevel ?? existing?.levelOverride,
  });
}

/**
 * Set a log level override for a specific component.
 */
export function setComponentLevel(name: string, level: LogLevel): void {
  const existing = registry.get(name);
  if (existing) {
    existing.levelOverride = level;
  } else {
    registry.set(name, { name, description: name, levelOverride: level });
  }
}

/**
 * Clear a component's level override, reverting to the global level.
 */
export function clearComponentLevel(name: string): void {
  const existing = registry.get(name);
  if (existing) {
    existing.levelOverride = undefined;
  }
}

export function getEffectiveLevel(name: string, globalLevel: LogLevel): LogLevel {
  return registry.get(name)?.levelOverride ?? globalLevel;
}

/**
 * Check if a message at the given level should be emitted for a component.
 * Child loggers ("soap-transport.ntlm") inherit the override of their parent.
 */
export function shouldLog(name: string, messageLevel: LogLevel, globalLevel: LogLevel): boolean {
  let effective = registry.get(name)?.levelOverride;
  if (!effective && name.includes('.')) {
    effective = registry.get(name.substring(0, name.indexOf('.')))?.levelOverride;
  }
  return shouldDisplayLogLevel(messageLevel, effective ?? globalLevel);
}

export function getRegisteredComponents(globalLevel: LogLevel): RegisteredComponent[] {
  const result: RegisteredComponent[] = [];
  for (const reg of registry.values()) {
    result.push({
      name: reg.name,
      description: reg.description,
      effectiveLevel: reg.levelOverride ?? globalLevel,
      hasOverride: reg.levelOverride !== undefined,
    });
  }
  return result.sort((a, b) => a.name.localeCompare(b.name));
}

/**
 * Apply overrides parsed from configuration.
 * Entries look like "soap-transport", "soap-auth:TRACE". A bare name means DEBUG.
 */
export function initFromEnv(debugComponents: string[]): void {
  for (const entry of debugComponents) {
    const colonIndex = entry.lastIndexOf(':');
    if (colonIndex > 0) {
      setComponentLevel(entry.substring(0, colonIndex), parseLogLevel(entry.substring(colonIndex + 1)));
    } else {
      setComponentLevel(entry, LogLevel.DEBUG);
    }
  }
}

/**
 * Reset all registry state (for testing)
 */
export function resetDebugRegistry(): void {
  registry.clear();
}
