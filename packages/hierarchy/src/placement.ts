import { isNetworkType, isSubnetType } from '@infragram/model';
import { MODULE_TYPE } from '@infragram/parser';

export interface ContainmentRule {
  /** Type placed inside the container. */
  child: string;
  /** Container type. */
  container: string;
  /**
   * `child` when the child names its container (a service names its cluster),
   * `container` when the container names the child (a service names its task definition).
   */
  referencedBy: 'child' | 'container';
}

export const CONTAINMENT_RULES: readonly ContainmentRule[] = [
  { child: 'aws_ecs_service', container: 'aws_ecs_cluster', referencedBy: 'child' },
  { child: 'aws_ecs_task_definition', container: 'aws_ecs_service', referencedBy: 'container' },
];

// Services that are not tied to a VPC and are drawn directly in their region.
const REGION_LEVEL_PREFIXES = ['aws_iam_', 'aws_s3_', 'aws_dynamodb_', 'aws_sns_', 'aws_sqs_', 'aws_ecr_', 'aws_kms_'];
const REGION_LEVEL_TYPES = new Set([MODULE_TYPE, 'aws_cloudwatch_log_group', 'aws_route53_zone']);

export type Placement = 'network' | 'subnet' | 'region' | 'scoped';

export function placementOf(type: string): Placement {
  if (isNetworkType(type)) return 'network';
  if (isSubnetType(type)) return 'subnet';
  if (REGION_LEVEL_TYPES.has(type) || REGION_LEVEL_PREFIXES.some((prefix) => type.startsWith(prefix))) return 'region';
  return 'scoped';
}

export function containmentRuleFor(type: string): ContainmentRule | undefined {
  return CONTAINMENT_RULES.find((rule) => rule.child === type);
}
