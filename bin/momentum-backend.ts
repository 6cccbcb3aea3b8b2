#!/usr/bin/env node
import 'source-map-support/register';
import * as cdk from 'aws-cdk-lib';
import { MomentumBackendStack } from '../lib/momentum-backend-stack';

const app = new cdk.App();

new MomentumBackendStack(app, 'MomentumBackendStack', {
  env: {
    account: process.env.CDK_DEFAULT_ACCOUNT,
    region: process.env.CDK_DEFAULT_REGION,
  },
  description: 'Momentum FC Backend - live football momentum tracking and prediction game',
});
