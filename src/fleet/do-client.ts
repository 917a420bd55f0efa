import type { FirewallRequest } from "./security-boundary.js";

/** DO API response types (only what we need) */
export interface DODroplet {
  id: number;
  name: string;
  status: "new" | "active" | "off" | "archive";
  region: { slug: string; name: string };
  size_slug?: string;
  vpc_uuid?: string;
  networks: {
    v4: Array<{ ip_address: string; type: "public" | "private" }>;
  };
  tags?: string[];
  created_at: string;
}

export interface DOForwardingRule {
  entry_protocol: "http" | "https" | "http2" | "tcp";
  entry_port: number;
  target_protocol: "http" | "https" | "http2" | "tcp";
  target_port: number;
  certificate_id?: string;
  tls_passthrough?: boolean;
}

export interface DOHealthCheck {
  protocol: "http" | "https" | "tcp";
  port: number;
  path?: string;
  check_interval_seconds?: number;
  response_timeout_seconds?: number;
  healthy_threshold?: number;
  unhealthy_threshold?: number;
}

export interface DOLoadBalancer {
  id: string;
  name: string;
  ip: string;
  status: "new" | "active" | "errored";
  tag?: string;
  vpc_uuid?: string;
  forwarding_rules: DOForwardingRule[];
  health_check?: DOHealthCheck;
  created_at: string;
}

export interface CreateLoadBalancerParams {
  name: string;
  region: string;
  vpc_uuid?: string;
  tag: string;
  forwarding_rules: DOForwardingRule[];
  health_check: DOHealthCheck;
  redirect_http_to_https?: boolean;
}

export interface DOFirewall {
  id: string;
  name: string;
  status: "waiting" | "succeeded" | "failed";
  tags: string[];
}

export class DOApiError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly doMessage: string,
  ) {
    super(`DO API error ${statusCode}: ${doMessage}`);
    this.name = "DOApiError";
  }
}

/** True for a 404: the resource is already gone. */
export function isNotFound(err: unknown): boolean {
  return err instanceof DOApiError && err.statusCode === 404;
}

export class DOClient {
  private readonly baseUrl = "https://api.digitalocean.com/v2";
  private readonly token: string;

  constructor(token: string) {
    this.token = token;
  }

  /** Create a droplet */
  async createDroplet(params: {
    name: string;
    region: string;
    size: string;
    image: string;
    ssh_keys: number[];
    tags: string[];
    vpc_uuid?: string;
    user_data?: string;
  }): Promise<DODroplet> {
    return this.post<{ droplet: DODroplet }>("/droplets", params).then((r) => r.droplet);
  }

  /** Get a droplet by ID */
  async getDroplet(id: number): Promise<DODroplet> {
    return this.get<{ droplet: DODroplet }>(`/droplets/${id}`).then((r) => r.droplet);
  }

  /** Delete a droplet */
  async deleteDroplet(id: number): Promise<void> {
    await this.del(`/droplets/${id}`);
  }

  async createLoadBalancer(params: CreateLoadBalancerParams): Promise<DOLoadBalancer> {
    return this.post<{ load_balancer: DOLoadBalancer }>("/load_balancers", params).then((r) => r.load_balancer);
  }

  async getLoadBalancer(id: string): Promise<DOLoadBalancer> {
    return this.get<{ load_balancer: DOLoadBalancer }>(`/load_balancers/${id}`).then((r) => r.load_balancer);
  }

  async deleteLoadBalancer(id: string): Promise<void> {
    await this.del(`/load_balancers/${id}`);
  }

  async createFirewall(params: FirewallRequest): Promise<DOFirewall> {
    return this.post<{ firewall: DOFirewall }>("/firewalls", params).then((r) => r.firewall);
  }

  async deleteFirewall(id: string): Promise<void> {
    await this.del(`/firewalls/${id}`);
  }

  private headers(): Record<string, string> {
    return {
      Authorization: `Bearer ${this.token}`,
      "Content-Type": "application/json",
    };
  }

  private async get<T>(path: string): Promise<T> {
    const res = await fetch(`${this.baseUrl}${path}`, {
      method: "GET",
      headers: this.headers(),
    });
    if (!res.ok) {
      throw await this.toError(res);
    }
    return res.json() as Promise<T>;
  }

  private async post<T>(path: string, body: unknown): Promise<T> {
    const res = await fetch(`${this.baseUrl}${path}`, {
      method: "POST",
      headers: this.headers(),
      body: JSON.stringify(body),
    });
    if (!res.ok) {
      throw await this.toError(res);
    }
    return res.json() as Promise<T>;
  }

  private async del(path: string): Promise<void> {
    const res = await fetch(`${this.baseUrl}${path}`, {
      method: "DELETE",
      headers: this.headers(),
    });
    if (!res.ok && res.status !== 204) {
      throw await this.toError(res);
    }
  }

  private async toError(res: Response): Promise<DOApiError> {
    const body: unknown = await res.json().catch(() => null);
    const message =
      typeof body === "object" && body !== null && "message" in body && typeof body.message === "string"
        ? body.message
        : res.statusText;
    return new DOApiError(res.status, message);
  }
}
