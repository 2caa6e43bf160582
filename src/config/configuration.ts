export default () => ({
  port: parseInt(process.env.PORT || '3000', 10),
  database: {
    path: process.env.DATABASE_PATH || 'inventory.sqlite',
    synchronize: process.env.DATABASE_SYNCHRONIZE !== 'false',
  },
  jwt: {
    secret: process.env.JWT_SECRET || 'change-me',
    expiresIn: process.env.JWT_EXPIRES_IN || '12h',
  },
  auth: {
    adminUsername: process.env.ADMIN_USERNAME || 'admin',
    adminPassword: process.env.ADMIN_PASSWORD || 'ChangeMe123',
  },
  ses: {
    region: process.env.SES_REGION || process.env.AWS_REGION,
    accessKeyId: process.env.AWS_ACCESS_KEY_ID,
    secretAccessKey: process.env.AWS_SECRET_ACCESS_KEY,
    from: process.env.SMTP_FROM,
  },
  store: {
    name: process.env.STORE_NAME || 'Retail Store',
    address: process.env.STORE_ADDRESS || '',
  },
  returns: {
    lookbackDays: process.env.RETURNS_LOOKBACK_DAYS || '10',
  },
  throttling: {
    ttlSeconds: process.env.THROTTLE_TTL_SECONDS || '60',
    limit: process.env.THROTTLE_LIMIT || '120',
  },
});
