/**
 * Resolver barrel: one module per AWS service area.
 */

export * from "./acm";
export * from "./dynamodb";
export * from "./elasticache";
export * from "./iam";
export * from "./images";
export * from "./instances";
export * from "./kinesis";
export * from "./rds";
export * from "./routeTables";
export * from "./securityGroups";
export * from "./sqs";
export * from "./subnets";
export * from "./vpcs";
