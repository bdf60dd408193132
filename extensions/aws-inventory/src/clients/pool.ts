/**
 * AWS SDK Client Pool
 *
 * One SDK v3 client per service/region for the lifetime of a scan:
 * - Shared credential provider (the SDK's default Node.js chain)
 * - SDK-side retry with adaptive throttling backoff
 * - Explicit teardown once the scan finishes
 */

import { EC2Client } from "@aws-sdk/client-ec2";
import { RDSClient } from "@aws-sdk/client-rds";
import { EFSClient } from "@aws-sdk/client-efs";
import { FSxClient } from "@aws-sdk/client-fsx";
import { RedshiftClient } from "@aws-sdk/client-redshift";
import { DynamoDBClient } from "@aws-sdk/client-dynamodb";
import { S3Client } from "@aws-sdk/client-s3";
import { CloudWatchClient } from "@aws-sdk/client-cloudwatch";
import { STSClient } from "@aws-sdk/client-sts";
import { fromNodeProviderChain } from "@aws-sdk/credential-providers";
import type { AwsCredentialIdentityProvider } from "@smithy/types";

// =============================================================================
// Service Map
// =============================================================================

/** SDK client type for each service the scanner talks to. */
export type AwsServiceClients = {
  ec2: EC2Client;
  rds: RDSClient;
  efs: EFSClient;
  fsx: FSxClient;
  redshift: RedshiftClient;
  dynamodb: DynamoDBClient;
  s3: S3Client;
  cloudwatch: CloudWatchClient;
  sts: STSClient;
};

export type AwsServiceName = keyof AwsServiceClients;

/** Settings applied to every client the pool creates. */
export type AwsClientSettings = {
  region: string;
  credentials?: AwsCredentialIdentityProvider;
  maxAttempts: number;
  retryMode: "standard" | "adaptive";
};

/**
 * Creates a client for a service and region. Tests inject in-process fakes here.
 */
export type AwsClientFactory = <S extends AwsServiceName>(
  service: S,
  settings: AwsClientSettings,
) => AwsServiceClients[S];

const CLIENT_FACTORIES: { [S in AwsServiceName]: (settings: AwsClientSettings) => AwsServiceClients[S] } = {
  ec2: (settings) => new EC2Client(settings),
  rds: (settings) => new RDSClient(settings),
  efs: (settings) => new EFSClient(settings),
  fsx: (settings) => new FSxClient(settings),
  redshift: (settings) => new RedshiftClient(settings),
  dynamodb: (settings) => new DynamoDBClient(settings),
  s3: (settings) => new S3Client(settings),
  cloudwatch: (settings) => new CloudWatchClient(settings),
  sts: (settings) => new STSClient(settings),
};

/**
 * Default factory backed by the real SDK clients.
 */
export function sdkClientFactory<S extends AwsServiceName>(
  service: S,
  settings: AwsClientSettings,
): AwsServiceClients[S] {
  const create = CLIENT_FACTORIES[service];
  return create(settings);
}

// =============================================================================
// Client Pool
// =============================================================================

export type ClientPoolConfig = {
  profile?: string;
  maxAttempts?: number;
  /** Overrides the credential chain. */
  credentials?: AwsCredentialIdentityProvider;
  factory?: AwsClientFactory;
};

type ClientMaps = { [S in AwsServiceName]: Map<string, AwsServiceClients[S]> };

export class AwsClientPool {
  private readonly factory: AwsClientFactory;
  private readonly credentials: AwsCredentialIdentityProvider | undefined;
  private readonly maxAttempts: number;
  private readonly clients: ClientMaps = {
    ec2: new Map(),
    rds: new Map(),
    efs: new Map(),
    fsx: new Map(),
    redshift: new Map(),
    dynamodb: new Map(),
    s3: new Map(),
    cloudwatch: new Map(),
    sts: new Map(),
  };

  constructor(config: ClientPoolConfig = {}) {
    this.factory = config.factory ?? sdkClientFactory;
    this.maxAttempts = config.maxAttempts ?? 5;
    // Injected factories build their own clients; only real ones need the chain.
    this.credentials = config.credentials
      ?? (config.factory ? undefined : fromNodeProviderChain(config.profile ? { profile: config.profile } : {}));
  }

  /**
   * Get or create the client for a service in a region
   */
  get<S extends AwsServiceName>(service: S, region: string): AwsServiceClients[S] {
    const byRegion: Map<string, AwsServiceClients[S]> = this.clients[service];
    const cached = byRegion.get(region);
    if (cached) return cached;

    const client = this.factory(service, {
      region,
      credentials: this.credentials,
      maxAttempts: this.maxAttempts,
      retryMode: "adaptive",
    });
    byRegion.set(region, client);
    return client;
  }

  /** Number of clients created so far. */
  get size(): number {
    return Object.values(this.clients).reduce((total, byRegion) => total + byRegion.size, 0);
  }

  /**
   * Destroy every pooled client and release their sockets
   */
  destroy(): void {
    for (const byRegion of Object.values(this.clients)) {
      for (const client of byRegion.values()) {
        client.destroy();
      }
      byRegion.clear();
    }
  }
}

/**
 * Create a client pool
 */
export function createClientPool(config?: ClientPoolConfig): AwsClientPool {
  return new AwsClientPool(config);
}
