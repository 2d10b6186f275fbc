/**
 * ACM certificate lookups.
 */

import {
  ListCertificatesCommand,
  ListTagsForCertificateCommand,
  type CertificateSummary,
} from "@aws-sdk/client-acm";
import type { AwsContext } from "@core/context";
import { NoMatchError, callAws } from "@core/errors";
import { requireRegion, requireValue } from "@core/query";
import type { QueryScope } from "@/types";

export interface CertificateByDomainQuery extends QueryScope {
  domainName: string;
}

export interface CertificateByTagQuery extends QueryScope {
  tagName: string;
}

/**
 * Lists the region's certificate summaries, following NextToken.
 */
export async function listCertificates(
  context: AwsContext,
  region: string,
  profile?: string
): Promise<CertificateSummary[]> {
  const client = context.acm(region, profile);
  const certificates: CertificateSummary[] = [];
  let nextToken: string | undefined;

  do {
    const command = new ListCertificatesCommand({ NextToken: nextToken });
    const response = await callAws("ListCertificates", () => client.send(command));
    certificates.push(...(response.CertificateSummaryList ?? []));
    nextToken = response.NextToken;
  } while (nextToken);

  return certificates;
}

/**
 * Resolves the ARN of the first certificate issued for `domainName`.
 *
 * @throws {NoMatchError} If no certificate has that domain name
 */
export async function resolveAcmCertificateArn(
  context: AwsContext,
  query: CertificateByDomainQuery
): Promise<string> {
  const region = requireRegion(query.region);
  const domainName = requireValue("domain name", query.domainName);

  const certificates = await listCertificates(context, region, query.profile);
  const match = certificates.find((certificate) => certificate.DomainName === domainName);
  if (!match?.CertificateArn) {
    throw new NoMatchError(`Certificate ${domainName} does not exist`);
  }
  return match.CertificateArn;
}

/**
 * Resolves the ARN of the first certificate tagged Name=`tagName`.
 * Tags are fetched one certificate at a time, stopping at the first match.
 *
 * @throws {NoMatchError} If no certificate carries the tag
 */
export async function resolveAcmCertificateArnByTagName(
  context: AwsContext,
  query: CertificateByTagQuery
): Promise<string> {
  const region = requireRegion(query.region);
  const tagName = requireValue("tag name", query.tagName);
  const client = context.acm(region, query.profile);

  for (const certificate of await listCertificates(context, region, query.profile)) {
    const arn = certificate.CertificateArn;
    if (!arn) {
      continue;
    }
    const response = await callAws("ListTagsForCertificate", () =>
      client.send(new ListTagsForCertificateCommand({ CertificateArn: arn }))
    );
    if ((response.Tags ?? []).some((tag) => tag.Key === "Name" && tag.Value === tagName)) {
      return arn;
    }
  }
  throw new NoMatchError(`Certificate ${tagName} does not exist`);
}
