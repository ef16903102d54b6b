import { Global, Module } from '@nestjs/common'
import { LedgerRepo } from './ledger.repo'
import { PgLedgerRepo } from './pg-ledger.repo'

@Global()
@Module({
	providers: [{ provide: LedgerRepo, useClass: PgLedgerRepo }],
	exports: [LedgerRepo]
})
export class LedgerModule {}
