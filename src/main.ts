import 'reflect-metadata'
import { Logger } from '@nestjs/common'
import { NestFactory } from '@nestjs/core'
import { AppModule } from './app.module'
import { envNumber, envString } from './utils/env'

async function bootstrap() {
  const app = await NestFactory.create(AppModule)

  app.enableCors({
    origin: envString('CORS_ORIGIN', 'http://localhost:5173'),
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type'],
  })

  const port = envNumber('PORT', 3000, { min: 0, integer: true })
  await app.listen(port)
  Logger.log(`listening on port ${port}`, 'Bootstrap')
}

bootstrap().catch((err: unknown) => {
  Logger.error(err instanceof Error ? err.stack ?? err.message : String(err), undefined, 'Bootstrap')
  process.exit(1)
})
