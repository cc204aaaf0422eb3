process.env.LOG_LEVEL = process.env.LOG_LEVEL || 'SILENT';
process.env.AWS_REGION = 'us-east-1';
