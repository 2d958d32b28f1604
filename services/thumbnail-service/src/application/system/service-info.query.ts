import { Injectable } from '@nestjs/common';

export interface ServiceInfo {
  service: string;
  kind: 'worker-service';
  status: 'ok';
  timestamp: string;
}

@Injectable()
export class ServiceInfoQuery {
  getInfo(): ServiceInfo {
    return {
      service: 'thumbnail-service',
      kind: 'worker-service',
      status: 'ok',
      timestamp: new Date().toISOString(),
    };
  }
}
