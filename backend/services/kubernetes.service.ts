/**
 * Создание пода в Kubernetes по запросу /kubecreate.
 * Контроллер знает только PodCreator; реализация ниже ходит в API-сервер
 * через @kubernetes/client-node и конфиг по умолчанию (in-cluster или ~/.kube/config).
 */
import { CoreV1Api, KubeConfig } from '@kubernetes/client-node';
import type { V1Pod } from '@kubernetes/client-node';

import { APP_NAME } from '../utils/appInfo';

export interface PodCreator {
  /** Возвращает текстовое описание созданного пода; при ошибке API промис отклоняется. */
  createPod(): Promise<string>;
}

/**
 * Часть CoreV1Api, которой мы пользуемся. В тестах подставляется фейк.
 */
export interface PodApi {
  createNamespacedPod(namespace: string, body: V1Pod): Promise<{ body: V1Pod }>;
}

export interface KubernetesPodOptions {
  namespace: string;
  image: string;
}

/**
 * Манифест пода: одно контейнерное приложение, имя генерирует API-сервер.
 */
export const buildPodManifest = ({ image }: KubernetesPodOptions): V1Pod => ({
  apiVersion: 'v1',
  kind: 'Pod',
  metadata: {
    generateName: `${APP_NAME}-`,
    labels: { 'app.kubernetes.io/created-by': APP_NAME },
  },
  spec: {
    restartPolicy: 'Never',
    containers: [{ name: 'main', image }],
  },
});

export class KubernetesPodCreator implements PodCreator {
  constructor(
    private readonly api: PodApi,
    private readonly options: KubernetesPodOptions,
  ) {}

  async createPod(): Promise<string> {
    const { namespace } = this.options;
    const { body } = await this.api.createNamespacedPod(namespace, buildPodManifest(this.options));
    const name = body.metadata?.name ?? '<unnamed>';
    return `${body.metadata?.namespace ?? namespace}/${name}`;
  }
}

/**
 * Фабрика для index.ts: грузит kubeconfig по умолчанию и собирает клиент CoreV1.
 */
export const createKubernetesPodCreator = (options: KubernetesPodOptions): KubernetesPodCreator => {
  const kc = new KubeConfig();
  kc.loadFromDefault();
  return new KubernetesPodCreator(kc.makeApiClient(CoreV1Api), options);
};
