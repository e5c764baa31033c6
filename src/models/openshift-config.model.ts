import { z } from "zod";

/**
 * networks.config.openshift.io. The first service network decides which IP
 * family a member is published with.
 */
export const NetworkConfigSchema = z.object({
  status: z.object({
    serviceNetwork: z.array(z.string()).default([])
  }).passthrough().default({})
}).passthrough();

export type NetworkConfig = z.infer<typeof NetworkConfigSchema>;

/**
 * infrastructures.config.openshift.io
 */
export const InfrastructureConfigSchema = z.object({
  status: z.object({
    etcdDiscoveryDomain: z.string().default("")
  }).passthrough().default({})
}).passthrough();

export type InfrastructureConfig = z.infer<typeof InfrastructureConfigSchema>;

export const ConditionStatusSchema = z.enum(["True", "False", "Unknown"]);

export type ConditionStatus = z.infer<typeof ConditionStatusSchema>;

export const OperatorConditionSchema = z.object({
  type: z.string(),
  status: ConditionStatusSchema,
  reason: z.string().optional(),
  message: z.string().optional(),
  lastTransitionTime: z.string().optional()
});

export type OperatorCondition = z.infer<typeof OperatorConditionSchema>;

/**
 * etcds.operator.openshift.io, the object carrying the operator conditions.
 * Unknown fields pass through so a status replace keeps them.
 */
export const OperatorResourceSchema = z.object({
  metadata: z.object({
    name: z.string().optional(),
    resourceVersion: z.string().optional()
  }).passthrough().default({}),
  status: z.object({
    conditions: z.array(OperatorConditionSchema).default([])
  }).passthrough().default({})
}).passthrough();

export type OperatorResource = z.infer<typeof OperatorResourceSchema>;
