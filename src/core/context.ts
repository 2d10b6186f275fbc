/**
 * Explicit AWS context threaded into every resolver call.
 *
 * Owns the SDK clients: one per (service, region, profile), created on first
 * use and reused afterwards. The caller constructs the context once per
 * process and calls `destroy()` at shutdown.
 */

import { ACMClient } from "@aws-sdk/client-acm";
import { DynamoDBClient } from "@aws-sdk/client-dynamodb";
import { EC2Client } from "@aws-sdk/client-ec2";
import { ElastiCacheClient } from "@aws-sdk/client-elasticache";
import { IAMClient } from "@aws-sdk/client-iam";
import { KinesisClient } from "@aws-sdk/client-kinesis";
import { RDSClient } from "@aws-sdk/client-rds";
import { SQSClient } from "@aws-sdk/client-sqs";
import { STSClient } from "@aws-sdk/client-sts";
import { fromIni } from "@aws-sdk/credential-provider-ini";
import { setupLogger } from "@shared/utils/logger";
import { InvalidQueryError } from "@core/errors";

const logger = setupLogger("lookup-filters:context");

type Credentials = ReturnType<typeof fromIni>;

/**
 * Settings every SDK client is constructed with.
 */
export interface ClientSettings {
  region: string;
  maxAttempts?: number;
  credentials?: Credentials;
}

/**
 * Options for building an AwsContext.
 */
export interface AwsContextOptions {
  /** Region used by lookups that do not name one */
  region?: string;
  /** Default shared-config profile; per-call profiles take precedence */
  profile?: string;
  /** Passed to the SDK's own retry strategy */
  maxAttempts?: number;
}

interface DestroyableClient {
  destroy(): void;
}

/**
 * Lazily created SDK clients for one service, keyed by region and profile.
 */
class ClientCache<T extends DestroyableClient> {
  private readonly clients = new Map<string, T>();

  constructor(
    private readonly service: string,
    private readonly create: (settings: ClientSettings) => T
  ) {}

  get(key: string, settings: () => ClientSettings): T {
    const existing = this.clients.get(key);
    if (existing) {
      return existing;
    }
    const client = this.create(settings());
    this.clients.set(key, client);
    logger.debug({ service: this.service, key }, "Created AWS client");
    return client;
  }

  get size(): number {
    return this.clients.size;
  }

  destroy(): void {
    for (const client of this.clients.values()) {
      client.destroy();
    }
    this.clients.clear();
  }
}

export class AwsContext {
  private readonly defaultRegion?: string;
  private readonly defaultProfile?: string;
  private readonly maxAttempts?: number;
  private readonly credentials = new Map<string, Credentials>();

  private readonly acmClients = new ClientCache("acm", (s) => new ACMClient(s));
  private readonly dynamoDbClients = new ClientCache("dynamodb", (s) => new DynamoDBClient(s));
  private readonly ec2Clients = new ClientCache("ec2", (s) => new EC2Client(s));
  private readonly elastiCacheClients = new ClientCache("elasticache", (s) => new ElastiCacheClient(s));
  private readonly iamClients = new ClientCache("iam", (s) => new IAMClient(s));
  private readonly kinesisClients = new ClientCache("kinesis", (s) => new KinesisClient(s));
  private readonly rdsClients = new ClientCache("rds", (s) => new RDSClient(s));
  private readonly sqsClients = new ClientCache("sqs", (s) => new SQSClient(s));
  private readonly stsClients = new ClientCache("sts", (s) => new STSClient(s));

  constructor(options: AwsContextOptions = {}) {
    this.defaultRegion = options.region || undefined;
    this.defaultProfile = options.profile || undefined;
    this.maxAttempts = options.maxAttempts;
  }

  /**
   * Picks the requested region, else the context default.
   *
   * @throws {InvalidQueryError} If neither is set
   */
  region(requested?: string): string {
    const region = requested || this.defaultRegion;
    if (!region) {
      throw new InvalidQueryError(
        "No region given and no default region configured (set AWS_REGION or `region` in the config file)"
      );
    }
    return region;
  }

  acm(region: string, profile?: string): ACMClient {
    return this.clientFor(this.acmClients, region, profile);
  }

  dynamodb(region: string, profile?: string): DynamoDBClient {
    return this.clientFor(this.dynamoDbClients, region, profile);
  }

  ec2(region: string, profile?: string): EC2Client {
    return this.clientFor(this.ec2Clients, region, profile);
  }

  elasticache(region: string, profile?: string): ElastiCacheClient {
    return this.clientFor(this.elastiCacheClients, region, profile);
  }

  iam(region: string, profile?: string): IAMClient {
    return this.clientFor(this.iamClients, region, profile);
  }

  kinesis(region: string, profile?: string): KinesisClient {
    return this.clientFor(this.kinesisClients, region, profile);
  }

  rds(region: string, profile?: string): RDSClient {
    return this.clientFor(this.rdsClients, region, profile);
  }

  sqs(region: string, profile?: string): SQSClient {
    return this.clientFor(this.sqsClients, region, profile);
  }

  sts(region: string, profile?: string): STSClient {
    return this.clientFor(this.stsClients, region, profile);
  }

  /**
   * Number of live clients across all services.
   */
  get clientCount(): number {
    return [
      this.acmClients,
      this.dynamoDbClients,
      this.ec2Clients,
      this.elastiCacheClients,
      this.iamClients,
      this.kinesisClients,
      this.rdsClients,
      this.sqsClients,
      this.stsClients,
    ].reduce((total, cache) => total + cache.size, 0);
  }

  /**
   * Destroys every cached client. The context stays usable; later calls
   * create fresh clients.
   */
  destroy(): void {
    const count = this.clientCount;
    this.acmClients.destroy();
    this.dynamoDbClients.destroy();
    this.ec2Clients.destroy();
    this.elastiCacheClients.destroy();
    this.iamClients.destroy();
    this.kinesisClients.destroy();
    this.rdsClients.destroy();
    this.sqsClients.destroy();
    this.stsClients.destroy();
    this.credentials.clear();
    logger.debug({ clients: count }, "AWS context destroyed");
  }

  private clientFor<T extends DestroyableClient>(
    cache: ClientCache<T>,
    region: string,
    profile?: string
  ): T {
    const effectiveProfile = profile || this.defaultProfile;
    return cache.get(`${region}|${effectiveProfile ?? ""}`, () => ({
      region,
      maxAttempts: this.maxAttempts,
      credentials: effectiveProfile ? this.credentialsFor(effectiveProfile) : undefined,
    }));
  }

  private credentialsFor(profile: string): Credentials {
    let provider = this.credentials.get(profile);
    if (!provider) {
      provider = fromIni({ profile });
      this.credentials.set(profile, provider);
    }
    return provider;
  }
}
