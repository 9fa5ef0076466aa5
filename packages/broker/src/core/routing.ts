/**
 * Destination matching:
 * - generic registrations match every message
 * - otherwise the destination must equal the name or one of the aliases
 * - a message without destination matches generic registrations only
 */
export interface RoutingTarget {
  name: string;
  aliases: readonly string[];
  generic: boolean;
}

export function matchesDestination(target: RoutingTarget, destination: string | undefined): boolean {
  if (target.generic) return true;
  if (destination === undefined) return false;
  return destination === target.name || target.aliases.includes(destination);
}

export function answersTo(target: RoutingTarget, nameOrAlias: string): boolean {
  return nameOrAlias === target.name || target.aliases.includes(nameOrAlias);
}
