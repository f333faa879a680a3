#!/usr/bin/env node
import * as cdk from 'aws-cdk-lib';
import { LoanTrackerStack } from '../lib/loan-tracker-stack';

const app = new cdk.App();

new LoanTrackerStack(app, 'LoanTrackerStack', {
  env: {
    account: process.env.CDK_DEFAULT_ACCOUNT,
    region: process.env.CDK_DEFAULT_REGION,
  },
  spreadsheetName: app.node.tryGetContext('spreadsheetName') ?? 'Prestamos',
  weekConvention: app.node.tryGetContext('weekConvention') === 'sunday' ? 'sunday' : 'monday',
  description: 'Loan Tracker Backend API - roster and weekly follow-up of players on loan',
});
