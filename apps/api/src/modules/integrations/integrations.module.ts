import { Module } from "@nestjs/common";

import { ConfigModule } from "../config/config.module";
import { BROKERAGE_GATEWAY } from "./brokerage-gateway";
import { OandaGatewayService } from "./oanda-gateway.service";

@Module({
  imports: [ConfigModule],
  providers: [OandaGatewayService, { provide: BROKERAGE_GATEWAY, useExisting: OandaGatewayService }],
  exports: [BROKERAGE_GATEWAY]
})
export class IntegrationsModule {}
