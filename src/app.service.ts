import { Injectable } from '@nestjs/common';

export interface ServiceBanner {
  message: string;
  version: string;
  status: string;
}

export interface HealthStatus {
  status: 'ok';
  version: string;
}

@Injectable()
export class AppService {
  private readonly version = process.env.npm_package_version ?? '1.0.0';

  getBanner(): ServiceBanner {
    return {
      message: 'Keyword organizer API',
      version: this.version,
      status: 'running',
    };
  }

  getHealth(): HealthStatus {
    return { status: 'ok', version: this.version };
  }
}
