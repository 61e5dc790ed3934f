#!/usr/bin/env node
import 'source-map-support/register';
import * as cdk from 'aws-cdk-lib';
import { PotatoTwinStack } from './potato-twin-stack';

const app = new cdk.App();

// Get environment configuration
const env = {
  account: process.env.CDK_DEFAULT_ACCOUNT,
  region: process.env.CDK_DEFAULT_REGION || 'us-east-1',
};

const stage = process.env.STAGE || 'development';

new PotatoTwinStack(app, 'PotatoTwinStack', {
  env,
  stage,
  description: 'Potato chamber twin - crop growth and chamber energy simulation API',
  tags: {
    Project: 'PotatoChamberTwin',
    Environment: stage,
  },
});

app.synth();
