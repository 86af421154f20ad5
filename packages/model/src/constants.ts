/** Region used when no provider supplies one. */
export const DEFAULT_REGION = 'us-east-1';

/** Cloud family this tool draws. Modules and unqualified references bind to it. */
export const TARGET_FAMILY = 'aws';

export const ROOT_LABEL = 'AWS Cloud';

export const NETWORK_TYPES: readonly string[] = ['aws_vpc', 'aws_default_vpc'];
export const SUBNET_TYPES: readonly string[] = ['aws_subnet', 'aws_default_subnet'];

const SCOPE_TITLES: Record<string, string> = {
  aws_vpc: 'VPC',
  aws_default_vpc: 'VPC',
  aws_subnet: 'Subnet',
  aws_default_subnet: 'Subnet',
};

export function isNetworkType(type: string): boolean {
  return NETWORK_TYPES.includes(type);
}

export function isSubnetType(type: string): boolean {
  return SUBNET_TYPES.includes(type);
}

export function scopeTitle(type: string): string {
  return SCOPE_TITLES[type] ?? type;
}
