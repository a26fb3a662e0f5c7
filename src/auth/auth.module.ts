import { Global, Module } from "@nestjs/common";
import { ArbiterAuthService } from "./arbiter-auth.service";
import { ArbiterAuthGuard } from "./arbiter-auth.guard";

@Global()
@Module({
	providers: [ArbiterAuthService, ArbiterAuthGuard],
	exports: [ArbiterAuthService, ArbiterAuthGuard],
})
export class AuthModule {}
