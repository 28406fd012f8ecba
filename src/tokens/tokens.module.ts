import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { SecurityToken } from '../entities/security-token.entity';
import { TokensController } from './tokens.controller';
import { TokensService } from './tokens.service';

@Module({
  imports: [TypeOrmModule.forFeature([SecurityToken])],
  controllers: [TokensController],
  providers: [TokensService],
})
export class TokensModule {}
