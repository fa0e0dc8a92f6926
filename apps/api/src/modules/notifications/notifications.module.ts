import { Module } from "@nestjs/common";

import { ConfigModule } from "../config/config.module";
import { NOTIFIER } from "./notifier";
import { NotifierService } from "./notifier.service";

@Module({
  imports: [ConfigModule],
  providers: [NotifierService, { provide: NOTIFIER, useExisting: NotifierService }],
  exports: [NOTIFIER, NotifierService]
})
export class NotificationsModule {}
