import { TARGET_FAMILY } from '@infragram/model';

// aws_vpc.main.id, "${aws_subnet.a.id}", [aws_subnet.a.id, aws_subnet.b.id]
// A dot or word character before the type means data.aws_vpc.x or module.x.aws_y, which are not resources.
const RESOURCE_REFERENCE = new RegExp(`(?<![\\w.-])(${TARGET_FAMILY}_[\\w-]+)\\.([A-Z_a-z][\\w-]*)`, 'g');

/** Resource addresses mentioned in the attribute values, in order of first appearance. */
export function extractReferences(attributes: Record<string, string>): string[] {
  const addresses = new Set<string>();
  for (const value of Object.values(attributes)) for (const match of value.matchAll(RESOURCE_REFERENCE)) addresses.add(`${match[1]}.${match[2]}`);
  return [...addresses];
}

export function typeOfAddress(address: string): string {
  return address.slice(0, address.indexOf('.'));
}
