import * as apigw from 'aws-cdk-lib/aws-apigateway';
import * as acm from 'aws-cdk-lib/aws-certificatemanager';
import * as route53 from 'aws-cdk-lib/aws-route53';
import * as targets from 'aws-cdk-lib/aws-route53-targets';
import { Construct } from 'constructs';
import { isWithinZone } from '../config';

export interface ApiCustomDomainProps {
  api: apigw.RestApi;
  hostname: string;
  hostedZoneId: string;
  hostedZoneName: string;
}

/**
 * TLS hostname in front of the API's default stage.
 *
 * The certificate covers exactly `hostname`. CloudFormation only completes a
 * DNS-validated certificate once validation succeeds, and the domain name
 * references it, so the hostname cannot serve traffic before that.
 */
export class ApiCustomDomain extends Construct {
  public readonly hostname: string;
  public readonly certificate: acm.Certificate;
  public readonly domainName: apigw.DomainName;

  constructor(scope: Construct, id: string, props: ApiCustomDomainProps) {
    super(scope, id);

    const { api, hostname, hostedZoneId, hostedZoneName } = props;
    if (!isWithinZone(hostname, hostedZoneName)) {
      throw new Error(`Hostname ${hostname} is not inside hosted zone ${hostedZoneName}`);
    }
    this.hostname = hostname;

    const hostedZone = route53.HostedZone.fromHostedZoneAttributes(this, 'HostedZone', {
      hostedZoneId,
      zoneName: hostedZoneName,
    });

    this.certificate = new acm.Certificate(this, 'Certificate', {
      domainName: hostname,
      validation: acm.CertificateValidation.fromDns(hostedZone),
    });

    this.domainName = new apigw.DomainName(this, 'DomainName', {
      domainName: hostname,
      certificate: this.certificate,
      endpointType: apigw.EndpointType.REGIONAL,
      securityPolicy: apigw.SecurityPolicy.TLS_1_2,
    });

    new apigw.BasePathMapping(this, 'BasePathMapping', {
      domainName: this.domainName,
      restApi: api,
      stage: api.deploymentStage,
    });

    // Alias to the regional endpoint, so endpoint changes need no DNS edit.
    new route53.ARecord(this, 'AliasRecord', {
      zone: hostedZone,
      recordName: hostname,
      target: route53.RecordTarget.fromAlias(new targets.ApiGatewayDomain(this.domainName)),
    });
  }

  get url(): string {
    return `https://${this.hostname}`;
  }
}
