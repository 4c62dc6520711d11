import { config } from 'dotenv';
import { z } from 'zod';

config();

const integer = (name: string, fallback: string, min = 0) =>
  z
    .string()
    .default(fallback)
    .transform((value, ctx) => {
      const parsed = Number(value);
      if (!Number.isInteger(parsed) || parsed < min) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${name} must be an integer >= ${min}` });
        return z.NEVER;
      }
      return parsed;
    });

const csv = (value: string | undefined) =>
  value ? value.split(',').map((item) => item.trim()).filter(Boolean) : [];

const UINT_PATTERN = /^(0x[0-9a-fA-F]+|\d+)$/;

const DEV_SECRETS = {
  SERVICE_API_TOKEN: 'dev-service-token',
  USER_TOKEN_SECRET: 'dev-user-token-secret',
  IDENTITY_ATTESTER_SECRET: 'dev-attester-secret'
} as const;

const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    PORT: integer('PORT', '4000', 1),
    CORS_ORIGINS: z.string().optional(),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
    SERVICE_API_TOKEN: z.string().min(8).optional(),
    USER_TOKEN_SECRET: z.string().min(8).optional(),
    FOUNDATION_ADDRESS: z.string().min(1).default('foundation-wallet'),
    OPERATIONS_ADDRESS: z.string().min(1).default('operations-wallet'),
    OPERATOR_ADDRESS: z.string().min(1).default('operator-wallet'),
    TRUSTED_FACTORIES: z.string().optional(),
    IDENTITY_ATTESTER_SECRET: z.string().min(8).optional(),
    IDENTITY_ROOTS: z
      .string()
      .default('1')
      .refine((value) => csv(value).every((root) => UINT_PATTERN.test(root)), {
        message: 'IDENTITY_ROOTS must be a comma separated list of unsigned integers'
      }),
    IDENTITY_APP_ID: z.string().min(1).default('escrow-raffle'),
    IDENTITY_ACTION: z.string().min(1).default('enter-market'),
    IDENTITY_GROUP_ID: integer('IDENTITY_GROUP_ID', '1'),
    BLOCK_TIME_MS: integer('BLOCK_TIME_MS', '12000', 1),
    REVEAL_DELAY_BLOCKS: integer('REVEAL_DELAY_BLOCKS', '2'),
    REVEAL_WINDOW_BLOCKS: integer('REVEAL_WINDOW_BLOCKS', '256', 1),
    REVEAL_TIMEOUT_SECONDS: integer('REVEAL_TIMEOUT_SECONDS', '86400', 1),
    CONFIRM_WINDOW_SECONDS: integer('CONFIRM_WINDOW_SECONDS', '604800'),
    FOUNDATION_FEE_PERCENT: integer('FOUNDATION_FEE_PERCENT', '3'),
    OPERATIONS_FEE_PERCENT: integer('OPERATIONS_FEE_PERCENT', '2'),
    LOTTERY_WINNER_PERCENT: integer('LOTTERY_WINNER_PERCENT', '95'),
    SELLER_DEPOSIT_PERCENT: integer('SELLER_DEPOSIT_PERCENT', '10'),
    SLASH_PERCENT: integer('SLASH_PERCENT', '50')
  })
  .superRefine((values, ctx) => {
    if (values.FOUNDATION_FEE_PERCENT + values.OPERATIONS_FEE_PERCENT > 100) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'fee percentages exceed 100', path: ['FOUNDATION_FEE_PERCENT'] });
    }
    for (const key of ['LOTTERY_WINNER_PERCENT', 'SELLER_DEPOSIT_PERCENT', 'SLASH_PERCENT'] as const) {
      if (values[key] > 100) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${key} must not exceed 100`, path: [key] });
      }
    }
    if (values.NODE_ENV === 'production') {
      for (const key of ['SERVICE_API_TOKEN', 'USER_TOKEN_SECRET', 'IDENTITY_ATTESTER_SECRET'] as const) {
        if (!values[key]) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${key} is required in production`, path: [key] });
        }
      }
    }
  })
  .transform((values) => ({
    ...values,
    corsOriginList: csv(values.CORS_ORIGINS),
    trustedFactoryList: csv(values.TRUSTED_FACTORIES),
    identityRootList: csv(values.IDENTITY_ROOTS).map((root) => BigInt(root))
  }));

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error('Invalid environment configuration', parsed.error.flatten().fieldErrors);
  throw new Error('Environment validation failed');
}

const values = parsed.data;

export const env = {
  nodeEnv: values.NODE_ENV,
  port: values.PORT,
  corsOrigins: values.corsOriginList,
  logLevel: values.LOG_LEVEL ?? (values.NODE_ENV === 'production' ? 'info' : values.NODE_ENV === 'test' ? 'silent' : 'debug'),
  serviceApiToken: values.SERVICE_API_TOKEN ?? DEV_SECRETS.SERVICE_API_TOKEN,
  userTokenSecret: values.USER_TOKEN_SECRET ?? DEV_SECRETS.USER_TOKEN_SECRET,
  treasury: {
    foundation: values.FOUNDATION_ADDRESS,
    operations: values.OPERATIONS_ADDRESS,
    operator: values.OPERATOR_ADDRESS
  },
  identity: {
    attesterSecret: values.IDENTITY_ATTESTER_SECRET ?? DEV_SECRETS.IDENTITY_ATTESTER_SECRET,
    roots: values.identityRootList,
    appId: values.IDENTITY_APP_ID,
    action: values.IDENTITY_ACTION,
    groupId: BigInt(values.IDENTITY_GROUP_ID)
  },
  chain: {
    blockTimeMs: values.BLOCK_TIME_MS
  },
  market: {
    trustedFactories: values.trustedFactoryList,
    foundationFeePercent: values.FOUNDATION_FEE_PERCENT,
    operationsFeePercent: values.OPERATIONS_FEE_PERCENT,
    lotteryWinnerPercent: values.LOTTERY_WINNER_PERCENT,
    sellerDepositPercent: values.SELLER_DEPOSIT_PERCENT,
    slashPercent: values.SLASH_PERCENT,
    revealDelayBlocks: values.REVEAL_DELAY_BLOCKS,
    revealWindowBlocks: values.REVEAL_WINDOW_BLOCKS,
    revealTimeoutSeconds: values.REVEAL_TIMEOUT_SECONDS,
    confirmWindowSeconds: values.CONFIRM_WINDOW_SECONDS
  }
};
