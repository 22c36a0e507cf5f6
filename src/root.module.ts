import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { MenuBotModule } from './app.module';
import {
    readEnvironment,
    toMenuBotOptions,
    validateEnvironment,
} from './config/environment';

export const EnvironmentModule = ConfigModule.forRoot({
    envFilePath: '.env',
    isGlobal: true,
    validate: validateEnvironment,
});

@Module({
    imports: [
        EnvironmentModule,
        MenuBotModule.forRootAsync({
            imports: [ConfigModule],
            inject: [ConfigService],
            useFactory: (config: ConfigService) =>
                toMenuBotOptions(readEnvironment(config)),
        }),
    ],
})
export class RootModule {}
