import { Module } from '@nestjs/common';
import { CoordinatorModule } from '../coordinator/coordinator.module';
import { RegistrationService } from './registration.service';

@Module({
  imports: [CoordinatorModule],
  providers: [RegistrationService],
  exports: [RegistrationService],
})
export class RegistrationModule {}
