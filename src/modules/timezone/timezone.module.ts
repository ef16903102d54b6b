import { Global, Logger, Module } from '@nestjs/common'
import { WarnOnceCache } from '../../utils/timezone'

/** One warn-once cache for the whole process, handed to every service that reads user timezones. */
@Global()
@Module({
	providers: [{ provide: WarnOnceCache, useFactory: () => new WarnOnceCache(new Logger('Timezone')) }],
	exports: [WarnOnceCache]
})
export class TimezoneModule {}
