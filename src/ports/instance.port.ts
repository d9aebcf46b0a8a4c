/**
 * Puerto de salida: instancias conocidas localmente.
 */
export interface InstancePort {
  upsert(instance: InstanceSnapshot): Promise<void>;
}

export interface InstanceSnapshot {
  name: string;
  connectionName: string;
  status: string;
  phoneNumber: string | null;
  profileName: string | null;
  profilePictureUrl: string | null;
  lastSeenAt: Date;
}

export const INSTANCE_PORT = Symbol('INSTANCE_PORT');
